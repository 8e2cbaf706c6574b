/**
 * Configuration validation.
 * @module config/validation
 */

import { ConfigurationError } from '../error/categories.js';
import { isLogLevel } from '../observability/logging.js';
import type { BatchConfig, CredentialsConfig, DynaQueryConfig } from './config.js';
import { isProfileCredentials, isStaticCredentials } from './config.js';

/**
 * Characters a table name may contain.
 */
const TABLE_NAME_CHARS = /^[a-zA-Z0-9_.-]*$/;

/**
 * Validates a configuration.
 *
 * @throws {ConfigurationError} If configuration is invalid
 */
export function validateConfig(config: DynaQueryConfig): void {
  if (config.region !== undefined) {
    validateRegion(config.region);
  }

  if (config.endpoint !== undefined) {
    validateEndpoint(config.endpoint);
  }

  if (config.credentials !== undefined) {
    validateCredentials(config.credentials);
  }

  if (config.tablePrefix !== undefined && !TABLE_NAME_CHARS.test(config.tablePrefix)) {
    throw new ConfigurationError(
      `Invalid table prefix: ${config.tablePrefix}. Only letters, digits, '_', '-' and '.' are allowed`
    );
  }

  if (config.logLevel !== undefined && !isLogLevel(config.logLevel)) {
    throw new ConfigurationError(`Invalid log level: ${config.logLevel}`);
  }

  if (config.batch !== undefined) {
    validateBatchConfig(config.batch);
  }
}

/**
 * Validates AWS region format (e.g. us-east-1, eu-west-2).
 */
function validateRegion(region: string): void {
  if (region.trim().length === 0) {
    throw new ConfigurationError('Region must be a non-empty string');
  }

  const regionPattern = /^[a-z]{2}-[a-z]+-\d+$/;
  if (!regionPattern.test(region)) {
    throw new ConfigurationError(`Invalid region format: ${region}. Expected format like 'us-east-1' or 'eu-west-2'`);
  }
}

function validateEndpoint(endpoint: string): void {
  if (endpoint.trim().length === 0) {
    throw new ConfigurationError('Endpoint must be a non-empty string');
  }

  let url: URL;
  try {
    url = new URL(endpoint);
  } catch (error) {
    throw new ConfigurationError(`Invalid endpoint URL: ${endpoint}`, {
      cause: error instanceof Error ? error.message : String(error),
    });
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigurationError('Endpoint URL must use http: or https: protocol');
  }
}

function validateCredentials(credentials: CredentialsConfig): void {
  if (isStaticCredentials(credentials)) {
    if (credentials.accessKeyId.trim().length === 0) {
      throw new ConfigurationError('Static credentials require non-empty accessKeyId');
    }
    if (credentials.secretAccessKey.trim().length === 0) {
      throw new ConfigurationError('Static credentials require non-empty secretAccessKey');
    }
  } else if (isProfileCredentials(credentials)) {
    if (credentials.profileName.trim().length === 0) {
      throw new ConfigurationError('Profile credentials require non-empty profileName');
    }
  }
}

function validateBatchConfig(config: Partial<BatchConfig>): void {
  if (config.backoffBaseMs !== undefined) {
    if (!Number.isFinite(config.backoffBaseMs) || config.backoffBaseMs < 0) {
      throw new ConfigurationError('Batch backoffBaseMs must be a non-negative number');
    }
    if (config.backoffBaseMs > 60000) {
      throw new ConfigurationError('Batch backoffBaseMs must not exceed 60000 (1 minute)');
    }
  }
  if (config.maxWriteRetries !== undefined) {
    if (!Number.isInteger(config.maxWriteRetries) || config.maxWriteRetries < 0) {
      throw new ConfigurationError('Batch maxWriteRetries must be a non-negative integer');
    }
    if (config.maxWriteRetries > 10) {
      throw new ConfigurationError('Batch maxWriteRetries must not exceed 10');
    }
  }
}
