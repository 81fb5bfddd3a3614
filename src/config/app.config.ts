import { registerAs } from '@nestjs/config';
import { parseEnv } from './env.schema';

export interface AppSettings {
  env: 'development' | 'production' | 'test';
  port: number;
  host: string;
  logLevel: string;
  corsOrigins: string[] | '*';
}

export default registerAs('app', (): AppSettings => {
  const env = parseEnv(process.env);
  const origins = env.CORS_ORIGINS.split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);

  return {
    env: env.NODE_ENV,
    port: env.PORT,
    host: env.HOST,
    logLevel: env.LOG_LEVEL,
    corsOrigins: origins.length === 0 || origins.includes('*') ? '*' : origins,
  };
});
