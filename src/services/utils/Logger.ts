/**
 * Structured logging service using Winston
 */

import winston from 'winston';
import path from 'path';
import fs from 'fs';
import { getConfig } from '../../config/environment';
import { bigintReplacer } from './PriceFormatter';
import { TradeClassification, ReferencePriceSample } from '../../types/swap.types';

const config = getConfig();

const logsDir = path.join(process.cwd(), 'logs');

/**
 * Custom log format with colors for console
 */
const consoleFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.colorize(),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    let metaStr = '';
    if (Object.keys(meta).length > 0) {
      metaStr = '\n' + JSON.stringify(meta, bigintReplacer, 2);
    }
    return `${timestamp} [${level}]: ${message}${metaStr}`;
  })
);

/**
 * JSON format for file logging
 */
const fileFormat = winston.format.combine(
  winston.format.timestamp(),
  winston.format.json({ replacer: bigintReplacer })
);

function buildTransports(): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: consoleFormat,
      silent: config.NODE_ENV === 'test',
    }),
  ];

  if (!config.LOG_TO_FILE) {
    return transports;
  }

  if (!fs.existsSync(logsDir)) {
    fs.mkdirSync(logsDir, { recursive: true });
  }

  transports.push(
    // Info and above to combined.log
    new winston.transports.File({
      filename: path.join(logsDir, 'combined.log'),
      format: fileFormat,
      level: 'info',
    }),

    // Errors to error.log
    new winston.transports.File({
      filename: path.join(logsDir, 'error.log'),
      format: fileFormat,
      level: 'error',
    }),

    // Large purchases only
    new winston.transports.File({
      filename: path.join(logsDir, 'large-purchases.log'),
      format: winston.format.combine(
        winston.format((info) => (info.type === 'large-purchase' ? info : false))(),
        fileFormat
      ),
      level: 'info',
    })
  );

  return transports;
}

/**
 * Logger instance
 */
export const logger = winston.createLogger({
  level: config.LOG_LEVEL,
  transports: buildTransports(),
});

/**
 * Log a classified large purchase
 */
export function logLargePurchase(
  trade: TradeClassification,
  context: { token: string; pool: string }
): void {
  logger.info('Large purchase detected', {
    type: 'large-purchase',
    ...context,
    blockNumber: trade.blockNumber,
    txHash: trade.transactionHash,
    baseAmount: trade.baseAmount,
    refAmountMicro: trade.refAmountMicro,
    byBase: trade.isLargeByBase,
    byRef: trade.isLargeByRef,
    buyer: trade.counterpartAddress,
  });
}

export function logChunkProcessed(
  pool: string,
  fromBlock: number,
  toBlock: number,
  events: number,
  processingTime?: number
): void {
  logger.debug('Chunk processed', {
    type: 'chunk',
    pool,
    fromBlock,
    toBlock,
    events,
    processingTime,
  });
}

/**
 * Log reference price resolution; non-historical tiers are data-quality warnings
 */
export function logReferencePrice(sample: ReferencePriceSample, blockNumber: number): void {
  const level = sample.source === 'historical-pool' ? 'debug' : 'warn';
  logger.log(level, `Reference price from ${sample.source}`, {
    type: 'reference-price',
    blockNumber,
    bucket: sample.bucket,
    priceMicro: sample.priceMicro,
  });
}

/**
 * Log service startup
 */
export function logServiceStart(serviceName: string, details?: Record<string, unknown>): void {
  logger.info(`${serviceName} started`, {
    type: 'service',
    service: serviceName,
    config: details,
  });
}

/**
 * Log service error
 */
export function logServiceError(
  serviceName: string,
  error: unknown,
  context?: Record<string, unknown>
): void {
  const err = error instanceof Error ? error : new Error(String(error));
  logger.error(`${serviceName} error`, {
    type: 'error',
    service: serviceName,
    error: err.message,
    stack: err.stack,
    ...context,
  });
}

export default logger;
