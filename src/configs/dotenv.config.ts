// configs/dotenv.config.ts
import dotenv from 'dotenv';
import { logger } from '@utils/logger';

export interface Keys {
  port: number;
  nodeEnv: string;
  APILiveVersion: string;
  corsOrigins: string[];
  jwtSecret: string;
  mongoURI: string;
  mongoDBName: string;
  mongoServerSelectionTimeoutMS: number;
  mongoMaxPoolSize: number;
  bcryptRounds: number;
}

type Env = Record<string, string | undefined>;

const toNumber = (value: string | undefined, fallback: number): number => {
  if (value === undefined || value.trim() === '') return fallback;
  return Number(value);
};

/**
 * Build the typed configuration from an environment map.
 * Throws when a required variable is missing or a numeric one is malformed.
 */
export const loadKeys = (env: Env = process.env): Keys => {
  const keys: Keys = {
    // 🚀 Server Configuration
    port: toNumber(env.PORT, 8000),
    nodeEnv: env.NODE_ENV || 'development',
    APILiveVersion: env.VERSION || '1.0.0',
    corsOrigins: env.CORS_ORIGINS
      ? env.CORS_ORIGINS.split(',').map((origin) => origin.trim()).filter(Boolean)
      : [],

    // 🔐 Security
    jwtSecret: env.JWT_SECRET || '',
    bcryptRounds: toNumber(env.BCRYPT_ROUNDS, 10),

    // 📊 MongoDB Configuration (empty URI means in-memory fallback)
    mongoURI: env.MONGO_URI || '',
    mongoDBName: env.MONGO_DB_NAME || 'qoe_boost',
    mongoServerSelectionTimeoutMS: toNumber(env.MONGO_SERVER_SELECTION_TIMEOUT_MS, 5000),
    mongoMaxPoolSize: toNumber(env.MONGO_MAX_POOL_SIZE, 10),
  };

  const problems: string[] = [];
  if (!keys.jwtSecret) problems.push('JWT_SECRET is required');
  if (!Number.isInteger(keys.port) || keys.port <= 0) problems.push('PORT must be a positive integer');
  if (!Number.isInteger(keys.bcryptRounds) || keys.bcryptRounds < 4 || keys.bcryptRounds > 15) {
    problems.push('BCRYPT_ROUNDS must be an integer between 4 and 15');
  }
  if (!Number.isInteger(keys.mongoServerSelectionTimeoutMS) || keys.mongoServerSelectionTimeoutMS <= 0) {
    problems.push('MONGO_SERVER_SELECTION_TIMEOUT_MS must be a positive integer');
  }
  if (!Number.isInteger(keys.mongoMaxPoolSize) || keys.mongoMaxPoolSize <= 0) {
    problems.push('MONGO_MAX_POOL_SIZE must be a positive integer');
  }

  if (problems.length) {
    throw new Error(`Invalid environment configuration: ${problems.join('; ')}`);
  }

  return keys;
};

/**
 * Read `.env` into process.env and load the configuration from it.
 */
export const loadKeysFromEnvironment = (): Keys => {
  dotenv.config();
  const keys = loadKeys(process.env);

  // 🔒 Secure Logging (hide sensitive information)
  logger.info('✅ Environment Variables Loaded:');
  logger.info(`   - NODE_ENV: ${keys.nodeEnv}`);
  logger.info(`   - PORT: ${keys.port}`);
  logger.info(`   - API_VERSION: ${keys.APILiveVersion}`);
  logger.info(`   - MONGO_URI: ${keys.mongoURI ? '***HIDDEN***' : '(not set, in-memory fallback)'}`);
  logger.info(`   - MONGO_DB_NAME: ${keys.mongoDBName}`);
  logger.info(`   - JWT_SECRET: ***HIDDEN***`);

  return keys;
};
