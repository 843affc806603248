import TelegramBot from 'node-telegram-bot-api';
import { encodeAction } from './actions';
import { ConversationEngine } from './conversation';
import type { ChatGateway, InboundEvent } from './conversation';
import type { MenuView } from './menus';
import { SessionStore } from './session';
import type { Config } from '../config/env';
import { HuggingFaceService, InferenceClient, OpenAiImageService } from '../services/inference';
import { logger } from '../utils/logger';
import { toErrorMessage } from '../utils/errors';

export function toKeyboard(view: MenuView): TelegramBot.InlineKeyboardButton[][] {
    return view.buttons.map((row) => row.map((button) => ({
        text: button.label,
        callback_data: encodeAction(button.action),
    })));
}

export function isNotModifiedError(error: unknown): boolean {
    return /message is not modified/i.test(toErrorMessage(error));
}

/**
 * Normalizes a Telegram message. Anything starting with a slash is a command;
 * captions count as text so a photo with a description still reaches the bot.
 */
export function toInboundEvent(msg: TelegramBot.Message): InboundEvent {
    const chatId = msg.chat.id;
    const text = msg.text ?? msg.caption ?? '';
    if (msg.text?.startsWith('/')) {
        return { kind: 'command', chatId, payload: text };
    }
    return { kind: 'text', chatId, payload: text };
}

/** `image/jpeg` → `image.jpg`; unknown or missing types fall back to PNG. */
export function photoFileName(contentType: string): string {
    const subtype = contentType.split(';')[0].trim().split('/')[1] ?? '';
    const extension = subtype === 'jpeg' ? 'jpg' : subtype.replace(/[^a-z0-9]/gi, '');
    return `image.${extension || 'png'}`;
}

export class TelegramGateway implements ChatGateway {
    constructor(private readonly bot: TelegramBot) {}

    async sendView(chatId: number, view: MenuView): Promise<number> {
        const options: TelegramBot.SendMessageOptions = view.buttons.length > 0
            ? { reply_markup: { inline_keyboard: toKeyboard(view) } }
            : {};
        const message = await this.bot.sendMessage(chatId, view.text, options);
        return message.message_id;
    }

    async editView(chatId: number, messageId: number, view: MenuView): Promise<void> {
        try {
            await this.bot.editMessageText(view.text, {
                chat_id: chatId,
                message_id: messageId,
                reply_markup: { inline_keyboard: toKeyboard(view) },
            });
        } catch (error) {
            // Pressing the same button twice renders identical content.
            if (isNotModifiedError(error)) return;
            throw error;
        }
    }

    async sendPhoto(chatId: number, image: Buffer, caption: string, contentType: string): Promise<void> {
        const mediaType = contentType.split(';')[0].trim() || 'image/png';
        await this.bot.sendPhoto(chatId, image, { caption }, { filename: photoFileName(mediaType), contentType: mediaType });
    }
}

export function startBot(config: Config): TelegramBot {
    const bot = new TelegramBot(config.telegramBotToken, { polling: true });
    logger.info('Bot is starting...');

    const inference = new InferenceClient({
        huggingface: new HuggingFaceService({
            apiKey: config.huggingFaceToken,
            baseUrl: config.huggingFaceBaseUrl,
            timeoutMs: config.inferenceTimeoutMs,
        }),
        openai: new OpenAiImageService({
            apiKey: config.openAiApiKey,
            baseUrl: config.openAiBaseUrl,
            timeoutMs: config.inferenceTimeoutMs,
        }),
    });
    const engine = new ConversationEngine(new SessionStore(), inference, new TelegramGateway(bot));

    const dispatch = (event: InboundEvent) => {
        engine.handle(event).catch((error: unknown) => {
            logger.error({ chatId: event.chatId, kind: event.kind, error: toErrorMessage(error) }, 'Failed to handle update');
        });
    };

    bot.on('message', (msg) => {
        dispatch(toInboundEvent(msg));
    });

    bot.on('callback_query', (query) => {
        bot.answerCallbackQuery(query.id).catch((error: unknown) => {
            logger.debug({ error: toErrorMessage(error) }, 'answerCallbackQuery failed');
        });

        const chatId = query.message?.chat.id;
        if (chatId === undefined) return;
        dispatch({ kind: 'callback', chatId, payload: query.data ?? '', messageId: query.message?.message_id });
    });

    bot.on('polling_error', (error) => {
        logger.error({ error: error.message }, 'Polling error');
    });

    logger.info('Bot is running and listening for messages.');
    return bot;
}
