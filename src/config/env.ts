import dotenv from 'dotenv';
import { ConfigurationError } from '../utils/errors';

dotenv.config();

export interface Config {
    telegramBotToken: string;
    huggingFaceToken: string;
    huggingFaceBaseUrl: string;
    openAiApiKey?: string;
    openAiBaseUrl: string;
    inferenceTimeoutMs: number; // per HTTP request, not per generation
    port: number;
}

export const DEFAULT_HF_BASE_URL = 'https://router.huggingface.co/hf-inference/models';
export const DEFAULT_OPENAI_BASE_URL = 'https://api.openai.com/v1';
export const DEFAULT_PORT = 10000;

const MIN_TIMEOUT_MS = 60_000;
const MAX_TIMEOUT_MS = 180_000;
const DEFAULT_TIMEOUT_MS = 120_000;

const read = (env: NodeJS.ProcessEnv, ...keys: string[]): string => {
    for (const key of keys) {
        const value = (env[key] || '').trim();
        if (value) return value;
    }
    return '';
};

const readNumber = (env: NodeJS.ProcessEnv, key: string, fallback: number): number => {
    const value = Number(read(env, key));
    return Number.isFinite(value) && value > 0 ? value : fallback;
};

const stripTrailingSlash = (url: string): string => url.replace(/\/+$/, '');

/**
 * Builds the runtime configuration from environment variables.
 * Throws a ConfigurationError naming every missing credential.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
    const telegramBotToken = read(env, 'TELEGRAM_BOT_TOKEN', 'TELEGRAM_TOKEN');
    const huggingFaceToken = read(env, 'HF_TOKEN', 'HUGGINGFACE_API_KEY');

    const missing: string[] = [];
    if (!telegramBotToken) missing.push('TELEGRAM_BOT_TOKEN');
    if (!huggingFaceToken) missing.push('HF_TOKEN');
    if (missing.length > 0) {
        throw new ConfigurationError(`Missing required environment variables: ${missing.join(', ')}`, missing);
    }

    const timeout = readNumber(env, 'INFERENCE_TIMEOUT_MS', DEFAULT_TIMEOUT_MS);

    return {
        telegramBotToken,
        huggingFaceToken,
        huggingFaceBaseUrl: stripTrailingSlash(read(env, 'HF_BASE_URL') || DEFAULT_HF_BASE_URL),
        openAiApiKey: read(env, 'OPENAI_API_KEY') || undefined,
        openAiBaseUrl: stripTrailingSlash(read(env, 'OPENAI_BASE_URL') || DEFAULT_OPENAI_BASE_URL),
        inferenceTimeoutMs: Math.min(MAX_TIMEOUT_MS, Math.max(MIN_TIMEOUT_MS, timeout)),
        port: readNumber(env, 'PORT', DEFAULT_PORT),
    };
}
