import axios from 'axios';
import { toErrorMessage, truncate } from '../../utils/errors';
import type { GenerationFailure } from './types';

const MAX_ERROR_LENGTH = 300;

export function toBuffer(data: unknown): Buffer {
    if (Buffer.isBuffer(data)) return data;
    if (data instanceof ArrayBuffer) return Buffer.from(data);
    if (ArrayBuffer.isView(data)) return Buffer.from(data.buffer, data.byteOffset, data.byteLength);
    if (typeof data === 'string') return Buffer.from(data);
    if (data === undefined || data === null) return Buffer.alloc(0);
    return Buffer.from(JSON.stringify(data));
}

const isRaw = (data: unknown): boolean =>
    typeof data === 'string' || data instanceof ArrayBuffer || ArrayBuffer.isView(data);

function parseJson(data: unknown): unknown {
    if (!isRaw(data)) return data ?? undefined;
    try {
        return JSON.parse(toBuffer(data).toString('utf8'));
    } catch {
        return undefined;
    }
}

function pickMessage(value: unknown): string | undefined {
    if (typeof value === 'string' && value.trim()) return value.trim();
    if (Array.isArray(value)) return pickMessage(value[0]);
    if (value !== null && typeof value === 'object') {
        return ('error' in value ? pickMessage(value.error) : undefined)
            ?? ('message' in value ? pickMessage(value.message) : undefined)
            ?? ('msg' in value ? pickMessage(value.msg) : undefined)
            ?? ('detail' in value ? pickMessage(value.detail) : undefined);
    }
    return undefined;
}

/**
 * Reads a human-readable message out of an error body such as
 * `{"error": "..."}`, `{"error": {"message": "..."}}` or `{"detail": "..."}`.
 * Falls back to the raw text when the body is not JSON.
 */
export function extractErrorMessage(data: unknown, fallback: string): string {
    const parsed = parseJson(data);
    const message = pickMessage(parsed) ?? (parsed === undefined ? toBuffer(data).toString('utf8').trim() : '');
    return truncate(message || fallback, MAX_ERROR_LENGTH);
}

/**
 * Reads `estimated_time` (seconds) from a "model is loading" body.
 */
export function extractEstimatedTime(data: unknown): number | undefined {
    const parsed = parseJson(data);
    if (parsed === null || typeof parsed !== 'object' || !('estimated_time' in parsed)) return undefined;
    const value = parsed.estimated_time;
    return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function classifyStatus(status: number, message: string): GenerationFailure {
    if (status === 401 || status === 403) return { status: 'auth_error', message };
    if (status === 404) return { status: 'not_found', message };
    return { status: 'other_error', message };
}

/**
 * Maps a thrown request error (timeout, DNS, reset...) to a failure result.
 */
export function classifyRequestError(error: unknown): GenerationFailure {
    if (axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT')) {
        return { status: 'other_error', message: 'timeout' };
    }
    return { status: 'other_error', message: truncate(toErrorMessage(error), MAX_ERROR_LENGTH) };
}
