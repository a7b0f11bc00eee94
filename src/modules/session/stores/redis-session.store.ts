import { Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { createClient } from 'redis';
import { z } from 'zod';
import { errorMessage } from '../../../common/utils/error.util';
import { ChatMessage } from '../../rag/types';
import { SessionStore } from './session-store.interface';

type RedisClient = ReturnType<typeof createClient>;

const historySchema = z.array(
    z.object({
        role: z.enum(['user', 'assistant']),
        content: z.string(),
        timestamp: z.number().optional(),
    }),
);

export interface RedisSessionStoreOptions {
    url: string;
    ttlSeconds: number;
}

/**
 * Redis-backed history: one JSON list per session under chat:<sessionId>, refreshed TTL on write
 */
export class RedisSessionStore implements SessionStore, OnModuleInit, OnModuleDestroy {
    private readonly logger = new Logger(RedisSessionStore.name);
    private readonly client: RedisClient;
    private isConnected = false;

    constructor(private readonly options: RedisSessionStoreOptions) {
        this.client = createClient({
            url: options.url,
            socket: {
                reconnectStrategy: (retries) => Math.min(retries * 50, 500),
            },
        });

        this.client.on('error', (err: unknown) => {
            this.logger.error(`Redis client error: ${errorMessage(err)}`);
        });

        this.client.on('ready', () => {
            this.logger.log('✅ Redis connected successfully');
            this.isConnected = true;
        });

        this.client.on('end', () => {
            this.isConnected = false;
        });
    }

    async onModuleInit(): Promise<void> {
        try {
            await this.client.connect();
        } catch (error) {
            this.logger.error(`Failed to connect to Redis: ${errorMessage(error)}`);
            throw error;
        }
    }

    async onModuleDestroy(): Promise<void> {
        if (this.isConnected) {
            await this.client.quit();
            this.logger.log('Redis disconnected');
        }
    }

    private key(sessionId: string): string {
        return `chat:${sessionId}`;
    }

    /**
     * Empty only when the key is missing; read and decode failures are rethrown
     */
    async getMessages(sessionId: string): Promise<ChatMessage[]> {
        try {
            const data = await this.client.get(this.key(sessionId));
            if (data === null) {
                return [];
            }
            return historySchema.parse(JSON.parse(data));
        } catch (error) {
            this.logger.error(`Failed to retrieve chat history for session ${sessionId}: ${errorMessage(error)}`);
            throw error;
        }
    }

    async saveMessages(sessionId: string, messages: ChatMessage[]): Promise<void> {
        try {
            await this.client.setEx(this.key(sessionId), this.options.ttlSeconds, JSON.stringify(messages));
            this.logger.debug(`💾 Saved chat history for session ${sessionId}`);
        } catch (error) {
            this.logger.error(`Failed to save chat history for session ${sessionId}: ${errorMessage(error)}`);
            throw error;
        }
    }

    async delete(sessionId: string): Promise<void> {
        await this.client.del(this.key(sessionId));
    }

    async checkHealth(): Promise<boolean> {
        if (!this.isConnected) {
            return false;
        }
        return (await this.client.ping()) === 'PONG';
    }
}
