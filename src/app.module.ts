import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { LoggerModule } from 'nestjs-pino';
import { parseEnv } from './config/env.schema';
import appConfig, { AppSettings } from './config/app.config';
import openaiConfig from './config/openai.config';
import ragConfig from './config/rag.config';
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
      load: [appConfig, openaiConfig, ragConfig],
      validate: (config) => parseEnv(config),
    }),
    LoggerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => {
        const settings = configService.getOrThrow<AppSettings>('app');
        return {
          pinoHttp: {
            level: settings.logLevel,
            redact: ['req.headers.authorization', 'req.headers.cookie'],
          },
        };
      },
    }),
    ApiModule,
    HealthModule,
  ],
})
export class AppModule { }
