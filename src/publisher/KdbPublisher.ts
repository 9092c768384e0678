import { DEFAULT_PUBLISH_FUNCTION, DEFAULT_PUBLISH_TABLE } from '@/constants.js';
import { KdbConnection, getErrorMessage } from '@/connection/index.js';
import type { KdbConnectionOptions, Logger } from '@/connection/index.js';
import { k } from '@/model/index.js';
import { createLogger } from '@/ui/logging/index.js';

/**
 * Options for KdbPublisher.
 *
 * Connection fields are forwarded to the underlying KdbConnection.
 */
export interface KdbPublisherOptions extends KdbConnectionOptions {
  /** Remote function `publish()` calls (default: .u.updjson) */
  functionName?: string;
  /** Table name `publish()` passes (default: events) */
  tableName?: string;
  /** Send without waiting for the server's reply (default: false) */
  async?: boolean;
  /** Existing connection to publish over instead of creating one */
  connection?: KdbConnection;
}

export interface SendOptions {
  /** Overrides the publisher's default delivery mode */
  async?: boolean;
}

/**
 * Boolean-returning boundary over one kdb+ connection.
 *
 * No method rejects: failures are logged, kept in `lastError` and reported
 * as `false`. A send that finds the connection down reconnects first.
 *
 * @example
 * ```typescript
 * const publisher = new KdbPublisher({ host: 'tick', port: 5010 });
 * if (await publisher.send('.u.updjson', 'sensors', '{"temp":21.5}')) {
 *   // delivered
 * }
 * publisher.close();
 * ```
 */
export class KdbPublisher {
  private readonly connection: KdbConnection;
  private readonly logger: Logger;
  private readonly functionName: string;
  private readonly tableName: string;
  private readonly asyncByDefault: boolean;
  private failure: string | null = null;

  constructor(options: KdbPublisherOptions = {}) {
    const { functionName, tableName, async, connection, ...connectionOptions } = options;
    this.logger = connectionOptions.logger ?? createLogger('publisher');
    this.connection = connection ?? new KdbConnection(connectionOptions);
    this.functionName = functionName ?? DEFAULT_PUBLISH_FUNCTION;
    this.tableName = tableName ?? DEFAULT_PUBLISH_TABLE;
    this.asyncByDefault = async ?? false;
  }

  /** Text of the most recent failure, cleared by the next success */
  get lastError(): string | null {
    return this.failure;
  }

  /**
   * Connect unless already connected.
   */
  async connect(): Promise<boolean> {
    if (this.connection.state === 'ready') {
      return true;
    }
    try {
      await this.connection.connect();
      this.failure = null;
      this.logger.info(`Connected to kdb+ at ${this.connection.target}`);
      return true;
    } catch (error) {
      this.recordFailure(`Connection to ${this.connection.target} failed`, error);
      return false;
    }
  }

  /**
   * Liveness check over the current connection; does not reconnect.
   */
  isConnected(): Promise<boolean> {
    return this.connection.isConnected();
  }

  /**
   * Call `functionName[tableName; payload]` with the table name as a symbol
   * and the payload as a char vector.
   */
  async send(functionName: string, tableName: string, payload: string, options: SendOptions = {}): Promise<boolean> {
    if (!(await this.connect())) {
      return false;
    }

    const args = [k.symbol(tableName), k.chars(payload)];
    try {
      if (options.async ?? this.asyncByDefault) {
        await this.connection.sendAsync(functionName, ...args);
      } else {
        await this.connection.sendSync(functionName, ...args);
      }
      this.failure = null;
      this.logger.debug(`Sent ${payload.length} chars to ${functionName} for ${tableName}`);
      return true;
    } catch (error) {
      this.recordFailure(`Send to ${functionName} failed`, error);
      return false;
    }
  }

  /**
   * `send` with the configured function and table names.
   */
  publish(payload: string, options: SendOptions = {}): Promise<boolean> {
    return this.send(this.functionName, this.tableName, payload, options);
  }

  close(): void {
    this.connection.close();
  }

  private recordFailure(context: string, error: unknown): void {
    this.failure = getErrorMessage(error);
    this.logger.info(`${context}: ${this.failure}`);
  }
}
