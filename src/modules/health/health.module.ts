import { Module } from '@nestjs/common';
import { TerminusModule } from '@nestjs/terminus';
import { SessionModule } from '../session/session.module';
import { VectorStoreModule } from '../vector-store/vector-store.module';
import { HealthController } from './health.controller';
import { SessionStoreHealthIndicator } from './session-store.health';
import { VectorStoreHealthIndicator } from './vector-store.health';

@Module({
  imports: [TerminusModule, VectorStoreModule, SessionModule],
  controllers: [HealthController],
  providers: [VectorStoreHealthIndicator, SessionStoreHealthIndicator],
})
export class HealthModule { }
