import { Inject, Injectable } from '@nestjs/common';
import { HealthCheckError, HealthIndicator, HealthIndicatorResult } from '@nestjs/terminus';
import { errorMessage } from '../../common/utils/error.util';
import { SESSION_STORE, SessionStore } from '../session/stores/session-store.interface';

@Injectable()
export class SessionStoreHealthIndicator extends HealthIndicator {
    constructor(@Inject(SESSION_STORE) private readonly store: SessionStore) {
        super();
    }

    async isHealthy(key: string): Promise<HealthIndicatorResult> {
        let healthy: boolean;
        try {
            healthy = await this.store.checkHealth();
        } catch (error) {
            throw new HealthCheckError(
                'Session store health check failed',
                this.getStatus(key, false, { message: errorMessage(error) }),
            );
        }

        const result = this.getStatus(key, healthy);
        if (!healthy) {
            throw new HealthCheckError('Session store is not healthy', result);
        }
        return result;
    }
}
