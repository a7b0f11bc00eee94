import { ChatMessage } from '../../rag/types';
import { SessionStore } from './session-store.interface';

interface StoredSession {
    messages: ChatMessage[];
    expiresAt: number;
}

export interface InMemorySessionStoreOptions {
    ttlSeconds: number;
}

/**
 * Process-local history with the same sliding TTL as the Redis store.
 * Expired sessions are dropped when read and swept on every write.
 */
export class InMemorySessionStore implements SessionStore {
    private readonly sessions = new Map<string, StoredSession>();

    constructor(private readonly options: InMemorySessionStoreOptions = { ttlSeconds: 24 * 60 * 60 }) { }

    async getMessages(sessionId: string): Promise<ChatMessage[]> {
        const session = this.sessions.get(sessionId);
        if (!session) {
            return [];
        }
        if (session.expiresAt <= Date.now()) {
            this.sessions.delete(sessionId);
            return [];
        }
        return [...session.messages];
    }

    async saveMessages(sessionId: string, messages: ChatMessage[]): Promise<void> {
        const now = Date.now();
        this.sweep(now);
        this.sessions.set(sessionId, {
            messages: [...messages],
            expiresAt: now + this.options.ttlSeconds * 1000,
        });
    }

    async delete(sessionId: string): Promise<void> {
        this.sessions.delete(sessionId);
    }

    async checkHealth(): Promise<boolean> {
        return true;
    }

    get size(): number {
        return this.sessions.size;
    }

    private sweep(now: number): void {
        for (const [sessionId, session] of this.sessions) {
            if (session.expiresAt <= now) {
                this.sessions.delete(sessionId);
            }
        }
    }
}
