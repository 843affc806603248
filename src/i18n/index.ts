import en from './locales/en.json';
import ru from './locales/ru.json';
import { DEFAULT_LANGUAGE } from '../bot/catalog';

export type TextKey = keyof typeof en;
export type TranslationTable = Partial<Record<TextKey, string>>;
export type TranslationReplacements = Record<string, string | number>;
export type Translate = (language: string | undefined, key: TextKey, replacements?: TranslationReplacements) => string;

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * Returns a lookup that tries the requested language, then the default one, then the key itself.
 * `{name}` placeholders are replaced from `replacements`; unknown placeholders are left as is.
 */
export function createTranslator(tables: Record<string, TranslationTable>, defaultLanguage: string): Translate {
    return (language, key, replacements) => {
        const table = language ? tables[language] : undefined;
        let translation = table?.[key] ?? tables[defaultLanguage]?.[key] ?? key;
        if (replacements) {
            Object.keys(replacements).forEach((rKey) => {
                const pattern = new RegExp(`\\{${escapeRegExp(rKey)}\\}`, 'g');
                translation = translation.replace(pattern, () => String(replacements[rKey]));
            });
        }
        return translation;
    };
}

export const t = createTranslator({ en, ru }, DEFAULT_LANGUAGE);
