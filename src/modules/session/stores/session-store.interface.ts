import { ChatMessage } from '../../rag/types';

export const SESSION_STORE = Symbol('SESSION_STORE');

/**
 * Persistence for per-session conversation history
 */
export interface SessionStore {
    getMessages(sessionId: string): Promise<ChatMessage[]>;
    saveMessages(sessionId: string, messages: ChatMessage[]): Promise<void>;
    delete(sessionId: string): Promise<void>;
    checkHealth(): Promise<boolean>;
}
