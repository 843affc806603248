import { afterAll, describe, expect, it, vi } from 'vitest';

vi.mock('dotenv', () => ({
    default: {
        config: () => {
            process.env.LOG_LEVEL = 'warn';
            return { parsed: { LOG_LEVEL: 'warn' } };
        },
    },
}));

import { logger } from './logger';

afterAll(() => {
    delete process.env.LOG_LEVEL;
});

describe('logger', () => {
    it('takes its level from the .env file', () => {
        expect(logger.level).toBe('warn');
    });
});
