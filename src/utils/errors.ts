/**
 * Raised while reading the environment. The only error allowed to stop the process.
 */
export class ConfigurationError extends Error {
    public readonly missing: string[];

    public constructor(message: string, missing: string[] = []) {
        super(message);
        this.name = 'ConfigurationError';
        this.missing = missing;
    }
}

export const toErrorMessage = (error: unknown): string => {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error ?? 'Unknown error');
};

export const truncate = (text: string, max: number): string =>
    text.length > max ? `${text.slice(0, max - 1)}…` : text;
