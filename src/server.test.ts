import type { Server } from 'http';
import axios from 'axios';
import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { createHealthServer } from './server';

let server: Server;
let baseUrl: string;

beforeAll(async () => {
    server = await new Promise<Server>((resolve) => {
        const listening = createHealthServer().listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
        throw new Error('Expected the server to listen on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
});

afterAll(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
});

describe('health server', () => {
    it('reports ok on /health', async () => {
        const response = await axios.get(`${baseUrl}/health`);
        expect(response.status).toBe(200);
        expect(response.data.ok).toBe(true);
        expect(typeof response.data.timestamp).toBe('string');
    });

    it('answers any other GET with ok', async () => {
        for (const path of ['/', '/healthz', '/anything/else']) {
            const response = await axios.get(`${baseUrl}${path}`);
            expect(response.status).toBe(200);
            expect(response.data).toBe('ok');
        }
    });

    it('rejects other methods', async () => {
        const response = await axios.post(`${baseUrl}/`, {}, { validateStatus: () => true });
        expect(response.status).toBe(404);
    });
});
