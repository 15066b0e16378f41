/**
 * Environment variable configuration and validation
 */

import dotenv from 'dotenv';
import Joi from 'joi';

// Load environment variables
dotenv.config();

const DECIMAL_STRING = /^\d+(\.\d+)?$/;

/**
 * Validated environment configuration
 */
export interface EnvironmentConfig {
  NODE_ENV: string;

  // Data source
  DATA_SOURCE: 'node' | 'explorer';
  RPC_URL: string;
  ETHERSCAN_API_KEY: string;
  NETWORK: 'ethereum-mainnet';

  // Logging
  LOG_LEVEL: 'debug' | 'info' | 'warn' | 'error';
  LOG_TO_FILE: boolean;

  // Large purchase thresholds (decimal strings)
  BIG_BUY_BASE_THRESHOLD: string;
  BIG_BUY_REF_THRESHOLD_USD: string;

  // Oracle and chunking
  ORACLE_BUCKET_SIZE: number;
  LOG_CHUNK_SIZE: number;
  RPC_TIMEOUT_MS: number;
  HISTORICAL_CALL_TIMEOUT_MS: number;
  FALLBACK_ETH_PRICE_USD: string;
  EXPLORER_REQUESTS_PER_SECOND: number;

  // Batch
  BATCH_CONCURRENCY: number;
  DEFAULT_BLOCK_WINDOW: number;
  JOBS_FILE: string;

  // Storage / API
  DATABASE_PATH: string;
  SERVE_API: boolean;
  API_PORT: number;
}

/**
 * Environment configuration schema
 */
const envSchema = Joi.object<EnvironmentConfig>({
  NODE_ENV: Joi.string().default('development'),

  DATA_SOURCE: Joi.string().valid('node', 'explorer').default('node'),
  RPC_URL: Joi.string().uri({ scheme: ['http', 'https', 'ws', 'wss'] }).allow('').default(''),
  ETHERSCAN_API_KEY: Joi.string().allow('').default(''),
  NETWORK: Joi.string().valid('ethereum-mainnet').default('ethereum-mainnet'),

  LOG_LEVEL: Joi.string()
    .valid('debug', 'info', 'warn', 'error')
    .default('info'),
  LOG_TO_FILE: Joi.boolean().default(true),

  BIG_BUY_BASE_THRESHOLD: Joi.string().pattern(DECIMAL_STRING).default('0.1'),
  // No default; checked when a run's thresholds are built
  BIG_BUY_REF_THRESHOLD_USD: Joi.string().pattern(DECIMAL_STRING).allow('').default(''),

  ORACLE_BUCKET_SIZE: Joi.number().integer().min(1).default(300),
  LOG_CHUNK_SIZE: Joi.number().integer().min(1).max(100000).default(1000),
  RPC_TIMEOUT_MS: Joi.number().integer().min(100).default(15000),
  HISTORICAL_CALL_TIMEOUT_MS: Joi.number().integer().min(100).default(45000),
  FALLBACK_ETH_PRICE_USD: Joi.string().pattern(DECIMAL_STRING).default('3500'),
  EXPLORER_REQUESTS_PER_SECOND: Joi.number().min(0.1).default(5),

  BATCH_CONCURRENCY: Joi.number().integer().min(1).max(16).default(1),
  DEFAULT_BLOCK_WINDOW: Joi.number().integer().min(1).default(1000),
  JOBS_FILE: Joi.string().default('./config/jobs.example.json'),

  DATABASE_PATH: Joi.string().default('./data/analysis.db'),
  SERVE_API: Joi.boolean().default(false),
  API_PORT: Joi.number().port().default(3000),
})
  .unknown(true);

/**
 * Validate and load environment configuration
 */
export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const { error, value } = envSchema.validate(env, {
    abortEarly: false,
    stripUnknown: true,
  });

  if (error) {
    const errorMessages = error.details.map((detail) => detail.message).join(', ');
    throw new Error(`Environment validation failed: ${errorMessages}`);
  }

  return value;
}

/**
 * Validate data source requirements
 */
export function validateDataSource(config: EnvironmentConfig): void {
  if (config.DATA_SOURCE === 'node' && !config.RPC_URL) {
    throw new Error('RPC_URL is required when DATA_SOURCE is set to "node"');
  }

  if (config.DATA_SOURCE === 'explorer' && !config.ETHERSCAN_API_KEY) {
    throw new Error(
      'ETHERSCAN_API_KEY is required when DATA_SOURCE is set to "explorer"'
    );
  }
}

/**
 * Global environment configuration
 */
let cachedConfig: EnvironmentConfig | null = null;

/**
 * Get validated environment configuration
 */
export function getConfig(): EnvironmentConfig {
  if (!cachedConfig) {
    cachedConfig = loadEnvironment();
  }
  return cachedConfig;
}
