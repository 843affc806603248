import { describe, expect, it } from 'vitest';
import { decodeAction, encodeAction } from './actions';

describe('decodeAction', () => {
    it('decodes every known tag', () => {
        expect(decodeAction('lang:ru')).toEqual({ kind: 'language', language: 'ru' });
        expect(decodeAction('menu:main')).toEqual({ kind: 'main_menu' });
        expect(decodeAction('menu:lang')).toEqual({ kind: 'change_language' });
        expect(decodeAction('menu:design')).toEqual({ kind: 'design' });
        expect(decodeAction('provider:openai')).toEqual({ kind: 'provider', providerId: 'openai' });
    });

    it('keeps the colon inside aspect ratios', () => {
        expect(decodeAction('size:9:16')).toEqual({ kind: 'size', aspectRatio: '9:16' });
        expect(decodeAction('size:16:9')).toEqual({ kind: 'size', aspectRatio: '16:9' });
    });

    it('marks unknown values and prefixes as unknown', () => {
        expect(decodeAction('lang:fr')).toEqual({ kind: 'unknown', tag: 'lang:fr' });
        expect(decodeAction('size:4:3')).toEqual({ kind: 'unknown', tag: 'size:4:3' });
        expect(decodeAction('provider:midjourney')).toEqual({ kind: 'unknown', tag: 'provider:midjourney' });
        expect(decodeAction('menu:settings')).toEqual({ kind: 'unknown', tag: 'menu:settings' });
        expect(decodeAction('buy_small')).toEqual({ kind: 'unknown', tag: 'buy_small' });
        expect(decodeAction('')).toEqual({ kind: 'unknown', tag: '' });
    });
});

describe('encodeAction', () => {
    it('produces the tags decodeAction reads', () => {
        expect(encodeAction({ kind: 'size', aspectRatio: '9:16' })).toBe('size:9:16');
        expect(encodeAction({ kind: 'provider', providerId: 'hf-sdxl' })).toBe('provider:hf-sdxl');
        expect(encodeAction({ kind: 'design' })).toBe('menu:design');
        expect(decodeAction(encodeAction({ kind: 'language', language: 'en' }))).toEqual({ kind: 'language', language: 'en' });
    });
});
