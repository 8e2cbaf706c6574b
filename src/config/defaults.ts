/**
 * Default configuration values.
 * @module config/defaults
 */

import type { LogLevel } from '../observability/logging.js';
import type { BatchConfig, CredentialsConfig, DynaQueryConfig } from './config.js';

/**
 * Default AWS region.
 */
export const DEFAULT_REGION = 'us-east-1';

/**
 * Endpoint used when DYNAMODB_LOCAL is enabled.
 */
export const LOCAL_ENDPOINT = 'http://localhost:8000';

export const DEFAULT_LOG_LEVEL: LogLevel = 'info';

/**
 * Default batch settings:
 * - backoffBaseMs: 50
 * - maxWriteRetries: 3
 */
export const DEFAULT_BATCH_CONFIG: Readonly<BatchConfig> = Object.freeze({
  backoffBaseMs: 50,
  maxWriteRetries: 3,
});

/**
 * Configuration with every default applied.
 */
export interface ResolvedConfig {
  region: string;
  endpoint?: string;
  credentials?: CredentialsConfig;
  tablePrefix: string;
  consistentRead: boolean;
  logLevel: LogLevel;
  batch: BatchConfig;
}

export function resolveConfig(config: DynaQueryConfig): ResolvedConfig {
  return {
    region: config.region ?? DEFAULT_REGION,
    endpoint: config.endpoint,
    credentials: config.credentials,
    tablePrefix: config.tablePrefix ?? '',
    consistentRead: config.consistentRead ?? true,
    logLevel: config.logLevel ?? DEFAULT_LOG_LEVEL,
    batch: {
      backoffBaseMs: config.batch?.backoffBaseMs ?? DEFAULT_BATCH_CONFIG.backoffBaseMs,
      maxWriteRetries: config.batch?.maxWriteRetries ?? DEFAULT_BATCH_CONFIG.maxWriteRetries,
    },
  };
}
