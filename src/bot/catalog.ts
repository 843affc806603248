export const LANGUAGES = ['ru', 'en'] as const;
export type Language = typeof LANGUAGES[number];

export const DEFAULT_LANGUAGE: Language = 'en';

export const LANGUAGE_LABELS: Record<Language, string> = {
    ru: '🇷🇺 Русский',
    en: '🇬🇧 English',
};

export function isLanguage(value: string): value is Language {
    return LANGUAGES.some((code) => code === value);
}

// --- Providers ---

export type Backend = 'huggingface' | 'openai';

export const PROVIDER_IDS = ['hf-flux', 'hf-sdxl', 'openai'] as const;
export type ProviderId = typeof PROVIDER_IDS[number];

export interface Provider {
    id: ProviderId;
    label: string;
    backend: Backend;
    model: string;
}

export const PROVIDERS: Record<ProviderId, Provider> = {
    'hf-flux': {
        id: 'hf-flux',
        label: 'Hugging Face · FLUX.1',
        backend: 'huggingface',
        model: 'black-forest-labs/FLUX.1-schnell',
    },
    'hf-sdxl': {
        id: 'hf-sdxl',
        label: 'Hugging Face · SDXL',
        backend: 'huggingface',
        model: 'stabilityai/stable-diffusion-xl-base-1.0',
    },
    openai: {
        id: 'openai',
        label: 'OpenAI · DALL·E 3',
        backend: 'openai',
        model: 'dall-e-3',
    },
};

export const DEFAULT_PROVIDER_ID: ProviderId = 'hf-flux';

export function isProviderId(value: string): value is ProviderId {
    return PROVIDER_IDS.some((id) => id === value);
}

// --- Aspect ratios ---

export const ASPECT_RATIOS = ['1:1', '9:16', '16:9'] as const;
export type AspectRatio = typeof ASPECT_RATIOS[number];

export const DEFAULT_ASPECT_RATIO: AspectRatio = '1:1';

export interface ImageSize {
    width: number;
    height: number;
    label: string;
}

export const ASPECT_RATIO_SIZES: Record<AspectRatio, ImageSize> = {
    '1:1': { width: 1024, height: 1024, label: '⬛ 1:1' },
    '9:16': { width: 768, height: 1344, label: '📱 9:16' },
    '16:9': { width: 1344, height: 768, label: '🖥 16:9' },
};

export function isAspectRatio(value: string): value is AspectRatio {
    return ASPECT_RATIOS.some((ratio) => ratio === value);
}
