/**
 * Client entry point.
 *
 * Holds the resolved configuration and one shared document client, and hands
 * out schema-bound tables.
 */

import { DynamoDBClient, type DynamoDBClientConfig } from '@aws-sdk/client-dynamodb';
import { DynamoDBDocumentClient } from '@aws-sdk/lib-dynamodb';
import { fromIni } from '@aws-sdk/credential-providers';

import type { DynaQueryConfig } from '../config/config.js';
import { type ResolvedConfig, resolveConfig } from '../config/defaults.js';
import { loadConfigFromEnv } from '../config/environment.js';
import { validateConfig } from '../config/validation.js';
import { ConsoleLogger, type Logger } from '../observability/logging.js';
import type { Schema } from '../schema/schema.js';
import { Table } from '../table/table.js';
import { DocumentClientTransport } from '../transport/document-client.js';
import type { Transport } from '../transport/transport.js';
import type { PlaceholderSequence } from '../updates/placeholder.js';

export interface DynaQueryClientOptions {
  /** Transport to use instead of the AWS document client */
  transport?: Transport;
  /** Logger to use instead of a console logger at the configured level */
  logger?: Logger;
  /** Placeholder source for update expressions of every table */
  placeholders?: PlaceholderSequence;
}

/**
 * Entry point for schema-bound table access.
 *
 * The AWS client and document client are created on first use and shared by
 * every table of this client.
 *
 * @example
 * ```typescript
 * const client = new DynaQueryClient({ region: 'eu-west-1', tablePrefix: 'staging_' });
 * const users = client.table(userSchema);
 * const user = await users.getOne(byHashKey('u1'));
 * ```
 */
export class DynaQueryClient {
  readonly config: ResolvedConfig;
  private readonly logger: Logger;
  private readonly placeholders?: PlaceholderSequence;
  private awsClient?: DynamoDBClient;
  private docClient?: DynamoDBDocumentClient;
  private readonly injectedTransport?: Transport;
  private documentTransport?: Transport;

  /**
   * @throws {ConfigurationError} If the configuration is invalid
   */
  constructor(config: DynaQueryConfig = {}, options: DynaQueryClientOptions = {}) {
    validateConfig(config);
    this.config = resolveConfig(config);
    this.logger = options.logger ?? new ConsoleLogger(this.config.logLevel);
    this.placeholders = options.placeholders;
    this.injectedTransport = options.transport;
  }

  /**
   * Creates a client configured from environment variables.
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env, options: DynaQueryClientOptions = {}): DynaQueryClient {
    return new DynaQueryClient(loadConfigFromEnv(env), options);
  }

  /**
   * Binds a schema to this client.
   */
  table<T extends object>(schema: Schema<T>): Table<T> {
    return new Table(schema, {
      transport: this.transport,
      tablePrefix: this.config.tablePrefix,
      consistentRead: this.config.consistentRead,
      backoffBaseMs: this.config.batch.backoffBaseMs,
      logger: this.logger,
      placeholders: this.placeholders,
    });
  }

  /**
   * Transport shared by every table; created on first access.
   */
  get transport(): Transport {
    if (this.injectedTransport !== undefined) {
      return this.injectedTransport;
    }
    if (this.documentTransport === undefined) {
      this.documentTransport = new DocumentClientTransport(this.getDocumentClient(), {
        logger: this.logger,
        maxWriteRetries: this.config.batch.maxWriteRetries,
        backoffBaseMs: this.config.batch.backoffBaseMs,
      });
    }
    return this.documentTransport;
  }

  /**
   * Gets the underlying document client, creating it on first call.
   */
  getDocumentClient(): DynamoDBDocumentClient {
    if (this.docClient === undefined) {
      this.awsClient = new DynamoDBClient(this.awsConfig());
      this.docClient = DynamoDBDocumentClient.from(this.awsClient, {
        marshallOptions: {
          removeUndefinedValues: true,
        },
        unmarshallOptions: {
          wrapNumbers: false,
        },
      });

      this.logger.info('DynamoDB client initialized', {
        region: this.config.region,
        endpoint: this.config.endpoint,
      });
    }
    return this.docClient;
  }

  /**
   * Releases the AWS client, if one was created.
   */
  close(): void {
    if (this.awsClient !== undefined) {
      this.logger.info('Closing DynamoDB client');
      this.awsClient.destroy();
      this.awsClient = undefined;
      this.docClient = undefined;
      this.documentTransport = undefined;
    }
  }

  private awsConfig(): DynamoDBClientConfig {
    const awsConfig: DynamoDBClientConfig = {
      region: this.config.region,
      endpoint: this.config.endpoint,
    };

    const credentials = this.config.credentials;
    if (credentials) {
      switch (credentials.type) {
        case 'static':
          awsConfig.credentials = {
            accessKeyId: credentials.accessKeyId,
            secretAccessKey: credentials.secretAccessKey,
            sessionToken: credentials.sessionToken,
          };
          break;
        case 'profile':
          awsConfig.credentials = fromIni({ profile: credentials.profileName });
          break;
        case 'environment':
          // the SDK's default chain reads the environment
          break;
      }
    }
    return awsConfig;
  }
}
