import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SessionService } from './session.service';
import { InMemorySessionStore } from './stores/in-memory-session.store';
import { RedisSessionStore } from './stores/redis-session.store';
import { SESSION_STORE, SessionStore } from './stores/session-store.interface';

/**
 * Session Module - conversation history in memory or Redis (SESSION_STORE)
 */
@Module({
    providers: [
        {
            provide: SESSION_STORE,
            inject: [ConfigService],
            useFactory: (configService: ConfigService): SessionStore => {
                const ttlSeconds = configService.get<number>('session.ttlSeconds') ?? 24 * 60 * 60;
                if (configService.get<string>('session.store') === 'redis') {
                    return new RedisSessionStore({
                        url: configService.get<string>('session.redisUrl') ?? 'redis://localhost:6379',
                        ttlSeconds,
                    });
                }
                return new InMemorySessionStore({ ttlSeconds });
            },
        },
        SessionService,
    ],
    exports: [SESSION_STORE, SessionService],
})
export class SessionModule { }
