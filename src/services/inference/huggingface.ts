import axios from 'axios';
import type { AxiosInstance, AxiosResponse } from 'axios';
import { logger } from '../../utils/logger';
import { classifyRequestError, classifyStatus, extractErrorMessage, extractEstimatedTime, toBuffer } from './payload';
import type { GenerationRequest, GenerationResult, ImageGenerator } from './types';

export const LOADING_RETRY_MIN_MS = 2_000;
export const LOADING_RETRY_MAX_MS = 20_000;
const LOADING_RETRY_DEFAULT_MS = 5_000;

export interface HuggingFaceOptions {
    apiKey?: string;
    baseUrl: string;
    timeoutMs: number;
    http?: AxiosInstance;
    sleep?: (ms: number) => Promise<void>;
}

type Attempt =
    | { kind: 'done'; result: GenerationResult }
    | { kind: 'loading'; message: string; estimatedSeconds?: number };

const defaultSleep = async (ms: number): Promise<void> => {
    await new Promise((resolve) => setTimeout(resolve, ms));
};

export function loadingRetryDelay(estimatedSeconds?: number): number {
    if (estimatedSeconds === undefined) return LOADING_RETRY_DEFAULT_MS;
    return Math.min(LOADING_RETRY_MAX_MS, Math.max(LOADING_RETRY_MIN_MS, Math.round(estimatedSeconds * 1000)));
}

/**
 * Text-to-image over the Hugging Face Inference API / router.
 *
 * The model is addressed by path (`{baseUrl}/{model}`) and answers with raw
 * image bytes. A cold model answers 503 with an `estimated_time`; that case
 * gets a single delayed retry.
 */
export class HuggingFaceService implements ImageGenerator {
    private readonly http: AxiosInstance;
    private readonly sleep: (ms: number) => Promise<void>;

    constructor(private readonly options: HuggingFaceOptions) {
        this.http = options.http ?? axios.create();
        this.sleep = options.sleep ?? defaultSleep;
    }

    async generate(request: GenerationRequest): Promise<GenerationResult> {
        if (!this.options.apiKey) {
            logger.warn('HF_TOKEN is not set, refusing to call Hugging Face');
            return { status: 'auth_error', message: 'Hugging Face token is missing' };
        }

        const first = await this.attempt(request);
        if (first.kind === 'done') return first.result;

        const delay = loadingRetryDelay(first.estimatedSeconds);
        logger.info({ model: request.model, delay }, 'Model is loading, retrying once');
        await this.sleep(delay);

        const second = await this.attempt(request);
        if (second.kind === 'done') return second.result;

        return {
            status: 'transient_unavailable',
            message: second.message,
            estimatedSeconds: second.estimatedSeconds,
        };
    }

    private async attempt(request: GenerationRequest): Promise<Attempt> {
        const url = `${this.options.baseUrl}/${request.model}`;
        logger.debug({ url, width: request.width, height: request.height }, 'Calling Hugging Face');

        let response: AxiosResponse<unknown>;
        try {
            response = await this.http.post<unknown>(url, {
                inputs: request.prompt,
                parameters: {
                    width: request.width,
                    height: request.height,
                },
            }, {
                headers: {
                    'Authorization': `Bearer ${this.options.apiKey}`,
                    'Content-Type': 'application/json',
                    'Accept': 'image/png',
                },
                responseType: 'arraybuffer',
                timeout: this.options.timeoutMs,
                validateStatus: () => true,
            });
        } catch (error) {
            const result = classifyRequestError(error);
            logger.error({ model: request.model, error: result.message }, 'Hugging Face request failed');
            return { kind: 'done', result };
        }

        return this.interpret(response);
    }

    private interpret(response: AxiosResponse<unknown>): Attempt {
        const contentType = String(response.headers['content-type'] ?? '');

        if (response.status >= 200 && response.status < 300 && contentType.startsWith('image/')) {
            return {
                kind: 'done',
                result: { status: 'success', image: toBuffer(response.data), contentType },
            };
        }

        const message = extractErrorMessage(response.data, `HTTP ${response.status}`);
        const estimatedSeconds = extractEstimatedTime(response.data);

        if (response.status === 503 && (estimatedSeconds !== undefined || /loading/i.test(message))) {
            return { kind: 'loading', message, estimatedSeconds };
        }

        logger.warn({ status: response.status, message }, 'Hugging Face returned an error');
        return { kind: 'done', result: classifyStatus(response.status, message) };
    }
}
