import dotenv from 'dotenv';
import Joi from 'joi';
import path from 'path';

export interface GmailConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  refreshToken: string;
  query?: string;
}

export interface AppConfig {
  nodeEnv: 'development' | 'test' | 'production';
  port: number;
  frontendUrl: string;
  databasePath: string;
  modelPath: string;
  relevanceThreshold?: number;
  reviewMargin: number;
  pipelineConcurrency: number;
  pipelineDebug: boolean;
  ingestEnabled: boolean;
  ingestCron: string;
  syncLookbackDays: number;
  gmail: GmailConfig;
}

interface EnvShape {
  NODE_ENV: AppConfig['nodeEnv'];
  PORT: number;
  FRONTEND_URL: string;
  DATABASE_PATH: string;
  MODEL_PATH: string;
  RELEVANCE_THRESHOLD?: number;
  REVIEW_MARGIN: number;
  PIPELINE_CONCURRENCY: number;
  PIPELINE_DEBUG: boolean;
  INGEST_ENABLED: boolean;
  INGEST_CRON: string;
  SYNC_LOOKBACK_DAYS: number;
  GMAIL_CLIENT_ID: string;
  GMAIL_CLIENT_SECRET: string;
  GMAIL_REDIRECT_URI: string;
  GMAIL_REFRESH_TOKEN: string;
  GMAIL_QUERY?: string;
}

const envSchema = Joi.object<EnvShape>({
  NODE_ENV: Joi.string().valid('development', 'test', 'production').default('development'),
  PORT: Joi.number().integer().min(1).max(65535).default(3000),
  FRONTEND_URL: Joi.string().uri().default('http://localhost:3005'),
  DATABASE_PATH: Joi.string().default(path.join('data', 'applications.db')),
  MODEL_PATH: Joi.string().default(path.join('models', 'relevance-model.json')),
  RELEVANCE_THRESHOLD: Joi.number().min(0).max(1).optional(),
  REVIEW_MARGIN: Joi.number().min(0).max(1).default(0.1),
  PIPELINE_CONCURRENCY: Joi.number().integer().min(1).max(64).default(4),
  PIPELINE_DEBUG: Joi.boolean().default(false),
  INGEST_ENABLED: Joi.boolean().default(false),
  INGEST_CRON: Joi.string().default('*/15 * * * *'),
  SYNC_LOOKBACK_DAYS: Joi.number().integer().min(1).max(3650).default(30),
  GMAIL_CLIENT_ID: Joi.string().allow('').default(''),
  GMAIL_CLIENT_SECRET: Joi.string().allow('').default(''),
  GMAIL_REDIRECT_URI: Joi.string().allow('').default('http://localhost:3000/oauth2callback'),
  GMAIL_REFRESH_TOKEN: Joi.string().allow('').default(''),
  GMAIL_QUERY: Joi.string().optional()
}).unknown(true);

/**
 * Validate environment variables into a typed config.
 * Throws with every violation listed when the environment is invalid.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const { error, value } = envSchema.validate(env, { abortEarly: false, convert: true });

  if (error || !value) {
    const details = error
      ? error.details.map(detail => `${detail.path.join('.')}: ${detail.message}`).join('\n')
      : 'no configuration produced';
    throw new Error(`Invalid environment configuration:\n${details}`);
  }

  return {
    nodeEnv: value.NODE_ENV,
    port: value.PORT,
    frontendUrl: value.FRONTEND_URL,
    databasePath: value.DATABASE_PATH,
    modelPath: value.MODEL_PATH,
    relevanceThreshold: value.RELEVANCE_THRESHOLD,
    reviewMargin: value.REVIEW_MARGIN,
    pipelineConcurrency: value.PIPELINE_CONCURRENCY,
    pipelineDebug: value.PIPELINE_DEBUG,
    ingestEnabled: value.INGEST_ENABLED,
    ingestCron: value.INGEST_CRON,
    syncLookbackDays: value.SYNC_LOOKBACK_DAYS,
    gmail: {
      clientId: value.GMAIL_CLIENT_ID,
      clientSecret: value.GMAIL_CLIENT_SECRET,
      redirectUri: value.GMAIL_REDIRECT_URI,
      refreshToken: value.GMAIL_REFRESH_TOKEN,
      query: value.GMAIL_QUERY
    }
  };
}

/**
 * Load `.env` and validate the resulting process environment
 */
export function loadConfigFromEnvironment(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}

export function hasGmailCredentials(config: AppConfig): boolean {
  return config.gmail.clientId.length > 0
    && config.gmail.clientSecret.length > 0
    && config.gmail.refreshToken.length > 0;
}
