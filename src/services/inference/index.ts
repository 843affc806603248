import type { Backend } from '../../bot/catalog';
import { toErrorMessage } from '../../utils/errors';
import type { GenerationRequest, GenerationResult, ImageGenerator } from './types';

export type { GenerationFailure, GenerationRequest, GenerationResult, ImageGenerator } from './types';
export { HuggingFaceService } from './huggingface';
export { OpenAiImageService } from './openai';

/**
 * Sends each request to the backend named in it.
 */
export class InferenceClient implements ImageGenerator {
    constructor(private readonly backends: Record<Backend, ImageGenerator>) {}

    async generate(request: GenerationRequest): Promise<GenerationResult> {
        try {
            return await this.backends[request.backend].generate(request);
        } catch (error) {
            return { status: 'other_error', message: toErrorMessage(error) };
        }
    }
}
