import type { Action } from './actions';
import {
    ASPECT_RATIOS,
    ASPECT_RATIO_SIZES,
    DEFAULT_ASPECT_RATIO,
    DEFAULT_PROVIDER_ID,
    LANGUAGES,
    LANGUAGE_LABELS,
    PROVIDER_IDS,
    PROVIDERS,
} from './catalog';
import type { ChatSession, Screen } from './session';
import { t } from '../i18n';
import type { TextKey, TranslationReplacements } from '../i18n';

export interface MenuButton {
    label: string;
    action: Action;
}

export interface MenuView {
    text: string;
    buttons: MenuButton[][];
}

const mainMenuRow = (session: ChatSession): MenuButton[] => [
    { label: t(session.language, 'btn_main_menu'), action: { kind: 'main_menu' } },
];

export function renderScreen(screen: Screen, session: ChatSession): MenuView {
    const lang = session.language;

    switch (screen) {
        case 'language_select':
            return {
                text: t(lang, 'language_prompt'),
                buttons: [LANGUAGES.map((language): MenuButton => ({
                    label: LANGUAGE_LABELS[language],
                    action: { kind: 'language', language },
                }))],
            };

        case 'main_menu':
            return {
                text: t(lang, 'main_menu'),
                buttons: [
                    [{ label: t(lang, 'btn_design'), action: { kind: 'design' } }],
                    [{ label: t(lang, 'btn_language'), action: { kind: 'change_language' } }],
                ],
            };

        case 'provider_menu':
            return {
                text: t(lang, 'provider_menu'),
                buttons: [
                    ...PROVIDER_IDS.map((providerId): MenuButton[] => [
                        { label: PROVIDERS[providerId].label, action: { kind: 'provider', providerId } },
                    ]),
                    [{ label: t(lang, 'btn_back'), action: { kind: 'main_menu' } }],
                ],
            };

        case 'size_menu': {
            const provider = PROVIDERS[session.providerId ?? DEFAULT_PROVIDER_ID];
            return {
                text: t(lang, 'size_menu', { provider: provider.label }),
                buttons: [
                    ASPECT_RATIOS.map((aspectRatio): MenuButton => ({
                        label: ASPECT_RATIO_SIZES[aspectRatio].label,
                        action: { kind: 'size', aspectRatio },
                    })),
                    [{ label: t(lang, 'btn_back'), action: { kind: 'design' } }],
                ],
            };
        }

        case 'awaiting_prompt': {
            const ratio = session.aspectRatio ?? DEFAULT_ASPECT_RATIO;
            const size = ASPECT_RATIO_SIZES[ratio];
            const provider = PROVIDERS[session.providerId ?? DEFAULT_PROVIDER_ID];
            return {
                text: t(lang, 'prompt_instructions', {
                    ratio,
                    width: size.width,
                    height: size.height,
                    provider: provider.label,
                }),
                buttons: [mainMenuRow(session)],
            };
        }
    }
}

/**
 * A plain message followed by a single "main menu" button, used wherever the
 * user needs a way back into the menu tree.
 */
export function renderNotice(session: ChatSession, key: TextKey, replacements?: TranslationReplacements): MenuView {
    return {
        text: t(session.language, key, replacements),
        buttons: [mainMenuRow(session)],
    };
}

export function withNotice(view: MenuView, notice: string): MenuView {
    return { ...view, text: `${notice}\n\n${view.text}` };
}
