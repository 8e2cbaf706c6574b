/**
 * Environment variable loading.
 * @module config/environment
 */

import { ConfigurationError } from '../error/categories.js';
import { isLogLevel } from '../observability/logging.js';
import type { CredentialsConfig, DynaQueryConfig } from './config.js';
import { DEFAULT_REGION, LOCAL_ENDPOINT } from './defaults.js';

/**
 * Loads configuration from environment variables.
 *
 * Supported environment variables:
 * - AWS_REGION / AWS_DEFAULT_REGION: AWS region
 * - AWS_ACCESS_KEY_ID, AWS_SECRET_ACCESS_KEY, AWS_SESSION_TOKEN: static credentials
 * - AWS_PROFILE: profile credentials
 * - AWS_TABLE_PREFIX: prefix for every table name
 * - DYNAMODB_ENDPOINT: custom endpoint (e.g. 'http://localhost:8000')
 * - DYNAMODB_LOCAL: 'true' or '1' to use the local endpoint
 * - DYNAQUERY_LOG_LEVEL: minimum log level
 * - DYNAQUERY_CONSISTENT_READ: 'false' or '0' for eventually consistent reads
 *
 * @throws {ConfigurationError} If DYNAQUERY_LOG_LEVEL is not a log level
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): DynaQueryConfig {
  const config: DynaQueryConfig = {
    region: env.AWS_REGION || env.AWS_DEFAULT_REGION || DEFAULT_REGION,
    credentials: loadCredentialsFromEnv(env),
  };

  if (env.DYNAMODB_ENDPOINT) {
    config.endpoint = env.DYNAMODB_ENDPOINT;
  } else if (getEnvBoolean(env, 'DYNAMODB_LOCAL')) {
    config.endpoint = LOCAL_ENDPOINT;
  }

  if (env.AWS_TABLE_PREFIX !== undefined) {
    config.tablePrefix = env.AWS_TABLE_PREFIX;
  }

  if (env.DYNAQUERY_CONSISTENT_READ !== undefined) {
    config.consistentRead = getEnvBoolean(env, 'DYNAQUERY_CONSISTENT_READ', true);
  }

  const logLevel = env.DYNAQUERY_LOG_LEVEL?.toLowerCase();
  if (logLevel !== undefined) {
    if (!isLogLevel(logLevel)) {
      throw new ConfigurationError(`Invalid DYNAQUERY_LOG_LEVEL: ${env.DYNAQUERY_LOG_LEVEL}`);
    }
    config.logLevel = logLevel;
  }

  return config;
}

/**
 * Loads credentials configuration from environment variables.
 *
 * Priority order:
 * 1. Static credentials (if AWS_ACCESS_KEY_ID and AWS_SECRET_ACCESS_KEY are set)
 * 2. Profile (if AWS_PROFILE is set)
 * 3. Environment (the SDK's default provider chain)
 */
function loadCredentialsFromEnv(env: NodeJS.ProcessEnv): CredentialsConfig {
  const accessKeyId = env.AWS_ACCESS_KEY_ID;
  const secretAccessKey = env.AWS_SECRET_ACCESS_KEY;

  if (accessKeyId && secretAccessKey) {
    return {
      type: 'static',
      accessKeyId,
      secretAccessKey,
      sessionToken: env.AWS_SESSION_TOKEN,
    };
  }

  if (env.AWS_PROFILE) {
    return {
      type: 'profile',
      profileName: env.AWS_PROFILE,
    };
  }

  return {
    type: 'environment',
  };
}

/**
 * Reads an environment variable as a boolean ('true' or '1').
 */
export function getEnvBoolean(env: NodeJS.ProcessEnv, key: string, defaultValue = false): boolean {
  const value = env[key];
  if (value === undefined) {
    return defaultValue;
  }

  return value.toLowerCase() === 'true' || value === '1';
}
