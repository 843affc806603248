import { isAspectRatio, isLanguage, isProviderId } from './catalog';
import type { AspectRatio, Language, ProviderId } from './catalog';

/**
 * Everything an inline button can ask for. Telegram only carries strings,
 * so actions are encoded into callback data when a keyboard is built and
 * decoded once when the press comes back.
 */
export type Action =
    | { kind: 'language'; language: Language }
    | { kind: 'main_menu' }
    | { kind: 'change_language' }
    | { kind: 'design' }
    | { kind: 'provider'; providerId: ProviderId }
    | { kind: 'size'; aspectRatio: AspectRatio }
    | { kind: 'unknown'; tag: string };

export function encodeAction(action: Action): string {
    switch (action.kind) {
        case 'language': return `lang:${action.language}`;
        case 'main_menu': return 'menu:main';
        case 'change_language': return 'menu:lang';
        case 'design': return 'menu:design';
        case 'provider': return `provider:${action.providerId}`;
        case 'size': return `size:${action.aspectRatio}`;
        case 'unknown': return action.tag;
    }
}

export function decodeAction(tag: string): Action {
    const separator = tag.indexOf(':');
    if (separator === -1) return { kind: 'unknown', tag };

    // Split on the first colon only: ratios such as "9:16" contain one too.
    const prefix = tag.slice(0, separator);
    const value = tag.slice(separator + 1);

    switch (prefix) {
        case 'lang':
            return isLanguage(value) ? { kind: 'language', language: value } : { kind: 'unknown', tag };
        case 'menu':
            if (value === 'main') return { kind: 'main_menu' };
            if (value === 'lang') return { kind: 'change_language' };
            if (value === 'design') return { kind: 'design' };
            return { kind: 'unknown', tag };
        case 'provider':
            return isProviderId(value) ? { kind: 'provider', providerId: value } : { kind: 'unknown', tag };
        case 'size':
            return isAspectRatio(value) ? { kind: 'size', aspectRatio: value } : { kind: 'unknown', tag };
        default:
            return { kind: 'unknown', tag };
    }
}
