import { describe, expect, it } from 'vitest';
import { encodeAction } from './actions';
import type { MenuView } from './menus';
import { renderNotice, renderScreen, withNotice } from './menus';
import { createSession } from './session';
import type { ChatSession } from './session';

const tags = (view: MenuView) => view.buttons.map((row) => row.map((button) => encodeAction(button.action)));

const session = (patch: Partial<ChatSession> = {}): ChatSession => ({ ...createSession(1), language: 'en', ...patch });

describe('renderScreen', () => {
    it('offers every language on the picker', () => {
        const view = renderScreen('language_select', createSession(1));
        expect(view.text).toBe('🌐 Choose your language / Выберите язык');
        expect(tags(view)).toEqual([['lang:ru', 'lang:en']]);
        expect(view.buttons[0].map((button) => button.label)).toEqual(['🇷🇺 Русский', '🇬🇧 English']);
    });

    it('renders the main menu in the chosen language', () => {
        const view = renderScreen('main_menu', session({ language: 'ru' }));
        expect(view.text).toBe('🏠 Главное меню\n\nВыберите раздел:');
        expect(tags(view)).toEqual([['menu:design'], ['menu:lang']]);
    });

    it('lists providers one per row with a back button', () => {
        const view = renderScreen('provider_menu', session());
        expect(tags(view)).toEqual([['provider:hf-flux'], ['provider:hf-sdxl'], ['provider:openai'], ['menu:main']]);
    });

    it('names the selected provider on the size menu', () => {
        const view = renderScreen('size_menu', session({ providerId: 'openai' }));
        expect(view.text).toBe('📐 Generator: OpenAI · DALL·E 3\n\nChoose the image size:');
        expect(tags(view)).toEqual([['size:1:1', 'size:9:16', 'size:16:9'], ['menu:design']]);
    });

    it('inserts ratio and pixel size into the prompt instructions', () => {
        const view = renderScreen('awaiting_prompt', session({ aspectRatio: '9:16', providerId: 'hf-flux' }));
        expect(view.text).toBe(
            '✍️ Size 9:16 (768×1344), generator: Hugging Face · FLUX.1.\n\n'
            + 'Send me a description of the image. Every new message becomes a new picture.',
        );
        expect(tags(view)).toEqual([['menu:main']]);
    });

    it('uses the default ratio and provider when none are selected', () => {
        const view = renderScreen('awaiting_prompt', session());
        expect(view.text.startsWith('✍️ Size 1:1 (1024×1024), generator: Hugging Face · FLUX.1.')).toBe(true);
    });
});

describe('renderNotice', () => {
    it('adds a main menu button', () => {
        const view = renderNotice(session({ language: 'ru' }), 'not_understood');
        expect(view).toEqual({
            text: '🤔 Извините, я не понял это действие.',
            buttons: [[{ label: '🏠 Главное меню', action: { kind: 'main_menu' } }]],
        });
    });
});

describe('withNotice', () => {
    it('puts the notice above the menu text', () => {
        expect(withNotice({ text: 'menu', buttons: [] }, 'hint')).toEqual({ text: 'hint\n\nmenu', buttons: [] });
    });
});
