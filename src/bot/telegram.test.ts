import TelegramBot from 'node-telegram-bot-api';
import { describe, expect, it, vi } from 'vitest';
import { isNotModifiedError, photoFileName, TelegramGateway, toInboundEvent, toKeyboard } from './telegram';

const message = (patch: Partial<TelegramBot.Message>): TelegramBot.Message => ({
    message_id: 1,
    date: 0,
    chat: { id: 42, type: 'private' },
    ...patch,
});

describe('toInboundEvent', () => {
    it('turns slash messages into commands', () => {
        expect(toInboundEvent(message({ text: '/start' }))).toEqual({ kind: 'command', chatId: 42, payload: '/start' });
    });

    it('passes plain text and captions through', () => {
        expect(toInboundEvent(message({ text: 'a red fox in snow' }))).toEqual({ kind: 'text', chatId: 42, payload: 'a red fox in snow' });
        expect(toInboundEvent(message({ caption: 'make it blue' }))).toEqual({ kind: 'text', chatId: 42, payload: 'make it blue' });
        expect(toInboundEvent(message({}))).toEqual({ kind: 'text', chatId: 42, payload: '' });
    });
});

describe('toKeyboard', () => {
    it('encodes button actions into callback data', () => {
        expect(toKeyboard({
            text: 'menu',
            buttons: [[
                { label: '📱 9:16', action: { kind: 'size', aspectRatio: '9:16' } },
                { label: 'Back', action: { kind: 'design' } },
            ]],
        })).toEqual([[
            { text: '📱 9:16', callback_data: 'size:9:16' },
            { text: 'Back', callback_data: 'menu:design' },
        ]]);
    });
});

describe('isNotModifiedError', () => {
    it('recognizes the Telegram "not modified" rejection', () => {
        expect(isNotModifiedError(new Error('ETELEGRAM: 400 Bad Request: message is not modified: specified new message content and reply markup are exactly the same'))).toBe(true);
        expect(isNotModifiedError(new Error('ETELEGRAM: 400 Bad Request: message to edit not found'))).toBe(false);
    });
});

describe('photoFileName', () => {
    it('derives the extension from the content type', () => {
        expect(photoFileName('image/jpeg')).toBe('image.jpg');
        expect(photoFileName('image/webp; charset=binary')).toBe('image.webp');
        expect(photoFileName('image/png')).toBe('image.png');
        expect(photoFileName('')).toBe('image.png');
    });
});

describe('TelegramGateway', () => {
    it('sends the photo with its real content type', async () => {
        const bot = new TelegramBot('test-token');
        const sendPhoto = vi.spyOn(bot, 'sendPhoto').mockResolvedValue(message({}));
        const image = Buffer.from('jpg');

        await new TelegramGateway(bot).sendPhoto(42, image, 'a red fox in snow', 'image/jpeg');

        expect(sendPhoto).toHaveBeenCalledWith(42, image, { caption: 'a red fox in snow' }, {
            filename: 'image.jpg',
            contentType: 'image/jpeg',
        });
    });
});
