import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { randomUUID } from 'crypto';
import { ChatMessage } from '../rag/types';
import { SESSION_STORE, SessionStore } from './stores/session-store.interface';

/**
 * Conversation sessions, keeping the last maxHistory exchanges of each
 */
@Injectable()
export class SessionService {
    private readonly logger = new Logger(SessionService.name);
    private readonly maxHistory: number;
    /** Tail of the pending writes per session id */
    private readonly writes = new Map<string, Promise<void>>();

    constructor(
        private readonly configService: ConfigService,
        @Inject(SESSION_STORE) private readonly store: SessionStore,
    ) {
        this.maxHistory = this.configService.get<number>('rag.maxHistory') ?? 2;
    }

    createSession(): string {
        const sessionId = `session_${randomUUID()}`;
        this.logger.debug(`🆕 Created session ${sessionId}`);
        return sessionId;
    }

    async addMessage(sessionId: string, role: ChatMessage['role'], content: string): Promise<void> {
        await this.append(sessionId, [{ role, content, timestamp: Date.now() }]);
    }

    async addExchange(sessionId: string, userMessage: string, assistantMessage: string): Promise<void> {
        const timestamp = Date.now();
        await this.append(sessionId, [
            { role: 'user', content: userMessage, timestamp },
            { role: 'assistant', content: assistantMessage, timestamp },
        ]);
    }

    async getMessages(sessionId: string): Promise<ChatMessage[]> {
        return this.store.getMessages(sessionId);
    }

    /**
     * History formatted for the system prompt, or null when there is none
     */
    async getConversationHistory(sessionId?: string | null): Promise<string | null> {
        if (!sessionId) {
            return null;
        }

        const messages = await this.store.getMessages(sessionId);
        if (messages.length === 0) {
            return null;
        }

        return messages
            .map((message) => `${message.role === 'user' ? 'User' : 'Assistant'}: ${message.content}`)
            .join('\n');
    }

    async clearSession(sessionId: string): Promise<void> {
        await this.enqueue(sessionId, () => this.store.delete(sessionId));
        this.logger.debug(`🗑️ Cleared session ${sessionId}`);
    }

    private append(sessionId: string, added: ChatMessage[]): Promise<void> {
        return this.enqueue(sessionId, async () => {
            const history = [...(await this.store.getMessages(sessionId)), ...added];
            const limit = this.maxHistory * 2;
            await this.store.saveMessages(sessionId, limit > 0 ? history.slice(-limit) : []);
        });
    }

    /**
     * Run writes to one session one after another. A failed write rejects
     * only its own caller; the next write still runs.
     */
    private async enqueue(sessionId: string, write: () => Promise<void>): Promise<void> {
        const previous = this.writes.get(sessionId) ?? Promise.resolve();
        const current = previous.then(write, write);
        this.writes.set(sessionId, current);

        try {
            await current;
        } finally {
            if (this.writes.get(sessionId) === current) {
                this.writes.delete(sessionId);
            }
        }
    }
}
