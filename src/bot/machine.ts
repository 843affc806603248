import type { Action } from './actions';
import { ASPECT_RATIO_SIZES, DEFAULT_ASPECT_RATIO, DEFAULT_PROVIDER_ID, PROVIDERS } from './catalog';
import type { ChatSession, Screen } from './session';
import type { TextKey } from '../i18n';
import type { GenerationRequest, GenerationResult } from '../services/inference/types';

export type Command = 'start' | 'menu' | 'help' | 'unknown';

export type MachineEvent =
    | { kind: 'command'; command: Command }
    | { kind: 'action'; action: Action }
    | { kind: 'text'; text: string };

export type Effect =
    | { type: 'show_menu'; screen: Screen; notice?: TextKey }
    | { type: 'not_understood' }
    | { type: 'show_help' }
    | { type: 'notice'; key: TextKey }
    | { type: 'generate'; request: GenerationRequest }
    | { type: 'generation_result'; request: GenerationRequest; result: GenerationResult };

export interface Transition {
    session: ChatSession;
    effects: Effect[];
}

const navigate = (session: ChatSession, screen: Screen, patch: Partial<ChatSession> = {}): Transition => {
    const awaitingPrompt = screen === 'awaiting_prompt';
    return {
        session: { ...session, ...patch, screen, awaitingPrompt },
        effects: [{ type: 'show_menu', screen }],
    };
};

const stay = (session: ChatSession, ...effects: Effect[]): Transition => ({ session, effects });

/**
 * Fills in the provider and ratio defaults for sessions that skipped a menu.
 */
export function buildGenerationRequest(session: ChatSession, prompt: string): GenerationRequest {
    const provider = PROVIDERS[session.providerId ?? DEFAULT_PROVIDER_ID];
    const { width, height } = ASPECT_RATIO_SIZES[session.aspectRatio ?? DEFAULT_ASPECT_RATIO];
    return {
        prompt: prompt.trim(),
        width,
        height,
        model: provider.model,
        backend: provider.backend,
    };
}

export function parseCommand(text: string): Command {
    // "/start@SomeBot payload" -> "start"
    const name = text.trim().slice(1).split(/[\s@]/)[0].toLowerCase();
    switch (name) {
        case 'start':
        case 'menu':
        case 'help':
            return name;
        default:
            return 'unknown';
    }
}

function onCommand(session: ChatSession, command: Command): Transition {
    switch (command) {
        case 'start':
            return navigate(session, 'language_select');
        case 'menu':
            return navigate(session, session.language ? 'main_menu' : 'language_select');
        case 'help':
            return stay(session, { type: 'show_help' });
        case 'unknown':
            return stay(session, { type: 'not_understood' });
    }
}

function onAction(session: ChatSession, action: Action): Transition {
    if (action.kind === 'unknown') {
        return stay(session, { type: 'not_understood' });
    }
    if (action.kind === 'language') {
        return navigate(session, 'main_menu', { language: action.language });
    }
    // Every other menu needs a language first.
    if (!session.language) {
        return navigate(session, 'language_select');
    }

    switch (action.kind) {
        case 'main_menu':
            return navigate(session, 'main_menu');
        case 'change_language':
            return navigate(session, 'language_select');
        case 'design':
            return navigate(session, 'provider_menu');
        case 'provider':
            return navigate(session, 'size_menu', { providerId: action.providerId });
        case 'size':
            return navigate(session, 'awaiting_prompt', { aspectRatio: action.aspectRatio });
    }
}

function onText(session: ChatSession, text: string): Transition {
    if (!session.language) {
        return navigate(session, 'language_select');
    }

    if (session.screen !== 'awaiting_prompt') {
        return stay(session, { type: 'show_menu', screen: session.screen, notice: 'use_buttons' });
    }

    if (text.trim().length === 0) {
        return stay(session, { type: 'show_menu', screen: 'awaiting_prompt', notice: 'empty_prompt' });
    }

    if (session.generating) {
        return stay(session, { type: 'notice', key: 'busy' });
    }

    return {
        session: { ...session, awaitingPrompt: true, generating: true },
        effects: [{ type: 'generate', request: buildGenerationRequest(session, text) }],
    };
}

/**
 * Computes the next session and the effects to render for one event.
 * Never mutates `session`.
 */
export function transition(session: ChatSession, event: MachineEvent): Transition {
    switch (event.kind) {
        case 'command':
            return onCommand(session, event.command);
        case 'action':
            return onAction(session, event.action);
        case 'text':
            return onText(session, event.text);
    }
}

/**
 * Applies a finished generation. The chat stays in prompt mode unless the
 * user navigated elsewhere while the request was running.
 */
export function completeGeneration(session: ChatSession, request: GenerationRequest, result: GenerationResult): Transition {
    return {
        session: {
            ...session,
            generating: false,
            awaitingPrompt: session.screen === 'awaiting_prompt',
        },
        effects: [{ type: 'generation_result', request, result }],
    };
}
