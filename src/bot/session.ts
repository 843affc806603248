import type { AspectRatio, Language, ProviderId } from './catalog';

export type Screen = 'language_select' | 'main_menu' | 'provider_menu' | 'size_menu' | 'awaiting_prompt';

export interface ChatSession {
    chatId: number;
    language?: Language;
    screen: Screen;
    providerId?: ProviderId;
    aspectRatio?: AspectRatio;
    awaitingPrompt: boolean;
    generating: boolean;
}

export function createSession(chatId: number): ChatSession {
    return {
        chatId,
        screen: 'language_select',
        awaitingPrompt: false,
        generating: false,
    };
}

/**
 * In-memory sessions keyed by chat id.
 *
 * `withLock` queues tasks per chat so that one event's read-modify-write of a
 * session finishes before the next event for the same chat starts. Chats do
 * not wait on each other.
 */
export class SessionStore {
    private readonly sessions = new Map<number, ChatSession>();
    private readonly locks = new Map<number, Promise<void>>();

    get(chatId: number): ChatSession {
        return this.sessions.get(chatId) ?? createSession(chatId);
    }

    save(session: ChatSession): void {
        this.sessions.set(session.chatId, session);
    }

    async withLock<T>(chatId: number, task: () => Promise<T>): Promise<T> {
        const currentLock = this.locks.get(chatId) ?? Promise.resolve();
        const next = currentLock.then(task);

        // The chain must keep going when a task fails.
        const safeLock = next.then(() => undefined, () => undefined);
        this.locks.set(chatId, safeLock);

        try {
            return await next;
        } finally {
            if (this.locks.get(chatId) === safeLock) {
                this.locks.delete(chatId);
            }
        }
    }

    isLocked(chatId: number): boolean {
        return this.locks.has(chatId);
    }
}
