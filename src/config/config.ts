/**
 * Configuration types and builder.
 * @module config
 */

import type { LogLevel } from '../observability/logging.js';

/**
 * Credentials configuration.
 */
export type CredentialsConfig =
  | { type: 'static'; accessKeyId: string; secretAccessKey: string; sessionToken?: string }
  | { type: 'profile'; profileName: string }
  | { type: 'environment' };

/**
 * Batch round-trip settings.
 */
export interface BatchConfig {
  /** Base delay in milliseconds for exponential backoff before re-sending unprocessed keys or writes */
  backoffBaseMs: number;
  /** Retries of unprocessed batch write requests per chunk */
  maxWriteRetries: number;
}

/**
 * Client configuration.
 */
export interface DynaQueryConfig {
  /**
   * AWS region of the tables.
   * @example 'us-east-1', 'eu-west-1'
   */
  region?: string;

  /**
   * Custom endpoint URL.
   * @example 'http://localhost:8000' for DynamoDB Local
   */
  endpoint?: string;

  /**
   * Credentials; the SDK's default provider chain is used when omitted.
   */
  credentials?: CredentialsConfig;

  /**
   * Prefix prepended to every schema table name (e.g. 'staging_').
   */
  tablePrefix?: string;

  /**
   * Whether reads are strongly consistent unless a call says otherwise.
   * @default true
   */
  consistentRead?: boolean;

  /**
   * Minimum level of the default console logger.
   * @default 'info'
   */
  logLevel?: LogLevel;

  /**
   * Batch round-trip settings.
   */
  batch?: Partial<BatchConfig>;
}

/**
 * Helper to check if credentials are static.
 */
export function isStaticCredentials(
  credentials: CredentialsConfig
): credentials is { type: 'static'; accessKeyId: string; secretAccessKey: string; sessionToken?: string } {
  return credentials.type === 'static';
}

/**
 * Helper to check if credentials use a profile.
 */
export function isProfileCredentials(
  credentials: CredentialsConfig
): credentials is { type: 'profile'; profileName: string } {
  return credentials.type === 'profile';
}

/**
 * Fluent builder for DynaQueryConfig objects.
 *
 * @example
 * ```typescript
 * const config = new DynaQueryConfigBuilder()
 *   .withRegion('eu-west-1')
 *   .withTablePrefix('staging_')
 *   .withBatchBackoff(100)
 *   .build();
 * ```
 */
export class DynaQueryConfigBuilder {
  private config: DynaQueryConfig = {};

  withRegion(region: string): this {
    this.config.region = region;
    return this;
  }

  withEndpoint(endpoint: string): this {
    this.config.endpoint = endpoint;
    return this;
  }

  withStaticCredentials(accessKeyId: string, secretAccessKey: string, sessionToken?: string): this {
    this.config.credentials = {
      type: 'static',
      accessKeyId,
      secretAccessKey,
      sessionToken,
    };
    return this;
  }

  withProfileCredentials(profileName: string): this {
    this.config.credentials = {
      type: 'profile',
      profileName,
    };
    return this;
  }

  withEnvironmentCredentials(): this {
    this.config.credentials = { type: 'environment' };
    return this;
  }

  withTablePrefix(tablePrefix: string): this {
    this.config.tablePrefix = tablePrefix;
    return this;
  }

  withConsistentRead(consistentRead: boolean): this {
    this.config.consistentRead = consistentRead;
    return this;
  }

  withLogLevel(logLevel: LogLevel): this {
    this.config.logLevel = logLevel;
    return this;
  }

  /**
   * Sets the base delay of the batch retry backoff.
   */
  withBatchBackoff(backoffBaseMs: number): this {
    this.config.batch = { ...this.config.batch, backoffBaseMs };
    return this;
  }

  /**
   * Sets how often unprocessed batch write requests are re-sent.
   */
  withMaxWriteRetries(maxWriteRetries: number): this {
    this.config.batch = { ...this.config.batch, maxWriteRetries };
    return this;
  }

  build(): DynaQueryConfig {
    return { ...this.config, batch: this.config.batch === undefined ? undefined : { ...this.config.batch } };
  }

  /**
   * Creates a builder from an existing config.
   */
  static from(config: DynaQueryConfig): DynaQueryConfigBuilder {
    const builder = new DynaQueryConfigBuilder();
    builder.config = { ...config };
    return builder;
  }
}
