import { decodeAction } from './actions';
import { completeGeneration, parseCommand, transition } from './machine';
import type { Effect, MachineEvent } from './machine';
import { renderNotice, renderScreen, withNotice } from './menus';
import type { MenuView } from './menus';
import type { ChatSession, SessionStore } from './session';
import { t } from '../i18n';
import type { TextKey } from '../i18n';
import type { GenerationFailure, GenerationRequest, GenerationResult, ImageGenerator } from '../services/inference/types';
import { logger } from '../utils/logger';
import { toErrorMessage, truncate } from '../utils/errors';

const MAX_CAPTION_LENGTH = 900;
const MAX_STATUS_PROMPT_LENGTH = 100;

/**
 * An update as delivered by the chat transport, before any interpretation.
 * `messageId` on a callback is the message carrying the pressed keyboard.
 */
export type InboundEvent =
    | { kind: 'command'; chatId: number; payload: string }
    | { kind: 'callback'; chatId: number; payload: string; messageId?: number }
    | { kind: 'text'; chatId: number; payload: string };

export interface ChatGateway {
    /** Resolves with the id of the sent message. */
    sendView(chatId: number, view: MenuView): Promise<number>;
    editView(chatId: number, messageId: number, view: MenuView): Promise<void>;
    sendPhoto(chatId: number, image: Buffer, caption: string, contentType: string): Promise<void>;
}

interface RenderContext {
    messageId?: number;
    statusMessageId?: number;
}

interface PendingGeneration {
    request: GenerationRequest;
    statusMessageId?: number;
}

const FAILURE_TEXT: Record<GenerationFailure['status'], TextKey> = {
    auth_error: 'error_auth',
    not_found: 'error_not_found',
    transient_unavailable: 'error_unavailable',
    other_error: 'error_other',
};

export function toMachineEvent(event: InboundEvent): MachineEvent {
    switch (event.kind) {
        case 'command':
            return { kind: 'command', command: parseCommand(event.payload) };
        case 'callback':
            return { kind: 'action', action: decodeAction(event.payload) };
        case 'text':
            return { kind: 'text', text: event.payload };
    }
}

/**
 * Runs inbound events through the state machine and renders the effects.
 *
 * Events for one chat are handled one at a time. The lock is released while
 * an image is generated, so the chat can still navigate, and re-taken to
 * apply the result.
 */
export class ConversationEngine {
    constructor(
        private readonly store: SessionStore,
        private readonly generator: ImageGenerator,
        private readonly gateway: ChatGateway,
    ) {}

    async handle(event: InboundEvent): Promise<void> {
        const { chatId } = event;

        const pending = await this.store.withLock(chatId, async () => {
            const { session, effects } = transition(this.store.get(chatId), toMachineEvent(event));
            this.store.save(session);
            const context: RenderContext = event.kind === 'callback' ? { messageId: event.messageId } : {};
            return this.renderAll(session, effects, context);
        });

        if (!pending) return;

        const { request } = pending;
        logger.info({ chatId, model: request.model, width: request.width, height: request.height }, 'Generating image');

        const result = await this.generator.generate(request).catch((error: unknown): GenerationResult => ({
            status: 'other_error',
            message: toErrorMessage(error),
        }));
        logger.info({ chatId, model: request.model, status: result.status }, 'Generation finished');

        await this.store.withLock(chatId, async () => {
            const { session, effects } = completeGeneration(this.store.get(chatId), request, result);
            this.store.save(session);
            await this.renderAll(session, effects, { statusMessageId: pending.statusMessageId });
        });
    }

    private async renderAll(session: ChatSession, effects: Effect[], context: RenderContext): Promise<PendingGeneration | undefined> {
        let pending: PendingGeneration | undefined;
        for (const effect of effects) {
            const started = await this.render(session, effect, context);
            pending = started ?? pending;
        }
        return pending;
    }

    private async render(session: ChatSession, effect: Effect, context: RenderContext): Promise<PendingGeneration | undefined> {
        const { chatId, language } = session;

        switch (effect.type) {
            case 'show_menu': {
                const view = renderScreen(effect.screen, session);
                if (effect.notice) {
                    await this.gateway.sendView(chatId, withNotice(view, t(language, effect.notice)));
                } else {
                    await this.replace(chatId, context.messageId, view);
                }
                return undefined;
            }

            case 'not_understood':
                await this.gateway.sendView(chatId, renderNotice(session, 'not_understood'));
                return undefined;

            case 'show_help':
                await this.gateway.sendView(chatId, renderNotice(session, 'help'));
                return undefined;

            case 'notice':
                await this.gateway.sendView(chatId, { text: t(language, effect.key), buttons: [] });
                return undefined;

            case 'generate': {
                const status: MenuView = {
                    text: t(language, 'generating', { prompt: truncate(effect.request.prompt, MAX_STATUS_PROMPT_LENGTH) }),
                    buttons: [],
                };
                try {
                    const statusMessageId = await this.gateway.sendView(chatId, status);
                    return { request: effect.request, statusMessageId };
                } catch (error) {
                    // The picture can still be delivered without the status line.
                    logger.warn({ chatId, error: toErrorMessage(error) }, 'Could not send generation status');
                    return { request: effect.request };
                }
            }

            case 'generation_result': {
                const { result } = effect;
                if (result.status === 'success') {
                    try {
                        await this.gateway.sendPhoto(chatId, result.image, truncate(effect.request.prompt, MAX_CAPTION_LENGTH), result.contentType);
                    } catch (error) {
                        const message = toErrorMessage(error);
                        logger.warn({ chatId, error: message }, 'Could not send the image');
                        await this.replace(chatId, context.statusMessageId, renderNotice(session, 'error_other', { message }));
                        return undefined;
                    }
                    await this.replace(chatId, context.statusMessageId, renderNotice(session, 'generation_done'));
                } else {
                    logger.warn({ chatId, status: result.status, message: result.message }, 'Generation failed');
                    const view = renderNotice(session, FAILURE_TEXT[result.status], { message: result.message });
                    await this.replace(chatId, context.statusMessageId, view);
                }
                return undefined;
            }
        }
    }

    /**
     * Edits the given message in place, or sends a new one when there is no
     * message to edit or the edit is rejected.
     */
    private async replace(chatId: number, messageId: number | undefined, view: MenuView): Promise<void> {
        if (messageId === undefined) {
            await this.gateway.sendView(chatId, view);
            return;
        }
        try {
            await this.gateway.editView(chatId, messageId, view);
        } catch (error) {
            logger.debug({ chatId, messageId, error: toErrorMessage(error) }, 'Edit failed, sending a new message');
            await this.gateway.sendView(chatId, view);
        }
    }
}
