import type { Backend } from '../../bot/catalog';

export interface GenerationRequest {
    prompt: string;
    width: number;
    height: number;
    model: string;
    backend: Backend;
}

export type GenerationResult =
    | { status: 'success'; image: Buffer; contentType: string }
    | { status: 'auth_error'; message: string }
    | { status: 'not_found'; message: string }
    | { status: 'transient_unavailable'; message: string; estimatedSeconds?: number }
    | { status: 'other_error'; message: string };

export type GenerationFailure = Exclude<GenerationResult, { status: 'success' }>;

/**
 * Turns a prompt into an image. Implementations resolve with a classified
 * failure instead of rejecting when the backend reports an error.
 */
export interface ImageGenerator {
    generate(request: GenerationRequest): Promise<GenerationResult>;
}
