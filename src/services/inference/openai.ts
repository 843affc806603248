import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { logger } from '../../utils/logger';
import { classifyRequestError, classifyStatus, extractErrorMessage } from './payload';
import type { GenerationRequest, GenerationResult, ImageGenerator } from './types';

export interface OpenAiOptions {
    apiKey?: string;
    baseUrl: string;
    timeoutMs: number;
    http?: AxiosInstance;
}

interface ImagesResponse {
    data?: Array<{ b64_json?: string; url?: string }>;
}

/**
 * DALL·E 3 only draws three sizes; pick the one with the same orientation.
 */
export function toOpenAiSize(width: number, height: number): string {
    if (width > height) return '1792x1024';
    if (height > width) return '1024x1792';
    return '1024x1024';
}

export class OpenAiImageService implements ImageGenerator {
    private readonly http: AxiosInstance;

    constructor(private readonly options: OpenAiOptions) {
        this.http = options.http ?? axios.create();
    }

    async generate(request: GenerationRequest): Promise<GenerationResult> {
        if (!this.options.apiKey) {
            logger.warn('OPENAI_API_KEY is not set, refusing to call OpenAI');
            return { status: 'auth_error', message: 'OpenAI API key is missing' };
        }

        const size = toOpenAiSize(request.width, request.height);
        logger.debug({ model: request.model, size }, 'Calling OpenAI Images');

        try {
            const response = await this.http.post<ImagesResponse>(`${this.options.baseUrl}/images/generations`, {
                model: request.model,
                prompt: request.prompt,
                n: 1,
                size,
                response_format: 'b64_json',
            }, {
                headers: {
                    'Authorization': `Bearer ${this.options.apiKey}`,
                    'Content-Type': 'application/json',
                },
                timeout: this.options.timeoutMs,
                validateStatus: () => true,
            });

            if (response.status < 200 || response.status >= 300) {
                const message = extractErrorMessage(response.data, `HTTP ${response.status}`);
                logger.warn({ status: response.status, message }, 'OpenAI returned an error');
                return classifyStatus(response.status, message);
            }

            const encoded = response.data?.data?.[0]?.b64_json;
            if (!encoded) {
                logger.error({ model: request.model }, 'No image data in OpenAI response');
                return { status: 'other_error', message: 'No image data in response' };
            }

            return { status: 'success', image: Buffer.from(encoded, 'base64'), contentType: 'image/png' };
        } catch (error) {
            const result = classifyRequestError(error);
            logger.error({ model: request.model, error: result.message }, 'OpenAI request failed');
            return result;
        }
    }
}
