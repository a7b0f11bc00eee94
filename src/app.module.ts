import { Module } from '@nestjs/common';
import { LoggerModule } from 'nestjs-pino';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { validateEnv } from './config/env.schema';
import appConfig from './config/app.config';
import openaiConfig from './config/openai.config';
import ragConfig from './config/rag.config';
import sessionConfig from './config/session.config';
import vectorStoreConfig from './config/vector-store.config';
import { ApiModule } from './modules/api/api.module';
import { HealthModule } from './modules/health/health.module';

/**
 * App Module - Main application module
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: `.env`,
      load: [appConfig, openaiConfig, ragConfig, vectorStoreConfig, sessionConfig],
      validate: validateEnv,
    }),
    LoggerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        pinoHttp: {
          level: configService.get<string>('app.logLevel') ?? 'info',
          autoLogging: configService.get<string>('app.env') !== 'test',
        },
      }),
    }),
    ApiModule,
    HealthModule,
  ],
})
export class AppModule { }
