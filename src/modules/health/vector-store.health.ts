import { Inject, Injectable } from '@nestjs/common';
import { HealthCheckError, HealthIndicator, HealthIndicatorResult } from '@nestjs/terminus';
import { errorMessage } from '../../common/utils/error.util';
import { VECTOR_DATABASE, VectorDatabase } from '../vector-store/types/vector-store.types';

@Injectable()
export class VectorStoreHealthIndicator extends HealthIndicator {
    constructor(@Inject(VECTOR_DATABASE) private readonly database: VectorDatabase) {
        super();
    }

    async isHealthy(key: string): Promise<HealthIndicatorResult> {
        let healthy: boolean;
        try {
            healthy = await this.database.checkHealth();
        } catch (error) {
            throw new HealthCheckError(
                'Vector store health check failed',
                this.getStatus(key, false, { message: errorMessage(error) }),
            );
        }

        const result = this.getStatus(key, healthy);
        if (!healthy) {
            throw new HealthCheckError('Vector store is not healthy', result);
        }
        return result;
    }
}
