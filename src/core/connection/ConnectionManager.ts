import { readFile } from 'fs/promises';
import { EventEmitter } from 'events';
import {
  connect,
  credsAuthenticator,
  ErrorCode,
  Events,
  NatsError,
  type ConnectionOptions,
  type NatsConnection,
  type Status,
} from 'nats';
import { type Logger, SilentLogger } from '../types/Logger';
import { ConnectionError, asError, errorMessage } from '../errors';
import { TIME, maxReconnectAttempts } from '../constants';
import type { ConnectionLifecycle, MessagingConnection } from '../types/Messaging';
import { NatsConnectionAdapter } from './NatsConnectionAdapter';

/**
 * Connection configuration options
 */
export interface ConnectionConfig {
  /** One server URL, or several separated by commas */
  servers: string;
  name: string;
  credentialsFile?: string;
  reconnectWait?: number;
  reconnectWindow?: number;
  logger?: Logger;
}

/**
 * Default connection configuration
 */
const DEFAULT_CONFIG: Required<Pick<ConnectionConfig, 'reconnectWait' | 'reconnectWindow'>> = {
  reconnectWait: TIME.RECONNECT_WAIT_MS,
  reconnectWindow: TIME.RECONNECT_WINDOW_MS,
};

/**
 * Split a comma-separated server list, dropping blanks
 */
export function parseServers(servers: string): string[] {
  return servers
    .split(',')
    .map((server) => server.trim())
    .filter((server) => server.length > 0);
}

/**
 * Mask sensitive information in URL for logging
 */
export function maskUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.password) {
      parsed.password = '****';
      return parsed.toString();
    }
    return url;
  } catch {
    return url.replace(/\/\/[^:/@]+:[^@]+@/, '//****:****@');
  }
}

function toConnectionError(error: unknown, details: Record<string, unknown>): ConnectionError {
  if (error instanceof NatsError && error.code === ErrorCode.AuthorizationViolation) {
    return ConnectionError.auth(error.message, details);
  }
  return ConnectionError.failed(errorMessage(error), details);
}

/**
 * Text of an error status, worded like the server's `-ERR` line
 */
export function describeServerError(status: Status): string {
  if (status.permissionContext) {
    const { operation, subject } = status.permissionContext;
    const kind = operation.charAt(0).toUpperCase() + operation.slice(1);
    return `Permissions Violation for ${kind} to "${subject}"`;
  }
  return typeof status.data === 'string' ? status.data : 'server error';
}

/**
 * ConnectionManager owns the NATS connection of one tool run
 *
 * Connects with the reconnect policy of the tool (fixed wait, attempts bounded
 * by a total window), reports disconnects and reconnects, and tells the caller
 * when the connection is gone for good.
 *
 * Events: `disconnected`, `reconnected` (server), `serverError` (message),
 * `closed` (reason).
 *
 * @example
 * ```typescript
 * const manager = new ConnectionManager({
 *   servers: 'nats://localhost:4222',
 *   name: 'NATS-SUB TOOL',
 *   logger: new ConsoleLogger(),
 * });
 *
 * const connection = await manager.connect();
 * connection.subscribe('updates', (msg) => console.log(msg.subject));
 *
 * const reason = await manager.closed();
 * ```
 */
export class ConnectionManager extends EventEmitter implements ConnectionLifecycle {
  private config: ConnectionConfig & typeof DEFAULT_CONFIG;
  private logger: Logger;
  private connection: NatsConnectionAdapter | null = null;
  private closedPromise: Promise<Error | undefined> | null = null;
  private isClosing = false;

  constructor(config: ConnectionConfig) {
    super();
    this.config = { ...DEFAULT_CONFIG, ...config };
    this.logger = config.logger || new SilentLogger();
  }

  /**
   * Client options derived from the configuration
   *
   * @throws {ConnectionError} When the credentials file cannot be read
   */
  async buildOptions(): Promise<ConnectionOptions> {
    const { reconnectWait, reconnectWindow } = this.config;
    const options: ConnectionOptions = {
      servers: parseServers(this.config.servers),
      name: this.config.name,
      reconnect: true,
      reconnectTimeWait: reconnectWait,
      maxReconnectAttempts: maxReconnectAttempts(reconnectWindow, reconnectWait),
    };

    if (this.config.credentialsFile) {
      options.authenticator = credsAuthenticator(
        await this.readCredentials(this.config.credentialsFile)
      );
    }

    return options;
  }

  private async readCredentials(path: string): Promise<Uint8Array> {
    try {
      return await readFile(path);
    } catch (error) {
      throw ConnectionError.auth(`Unable to read credentials file: ${errorMessage(error)}`, {
        path,
      });
    }
  }

  /**
   * Connect, or return the live connection
   *
   * @throws {ConnectionError} When the server cannot be reached or rejects us
   */
  async connect(): Promise<MessagingConnection> {
    if (this.isClosing) {
      throw ConnectionError.closed('ConnectionManager has been closed');
    }

    if (this.connection) {
      return this.connection;
    }

    const options = await this.buildOptions();
    const servers = parseServers(this.config.servers);

    this.logger.debug('Connecting to NATS', {
      servers: servers.map(maskUrl),
      name: this.config.name,
      maxReconnectAttempts: options.maxReconnectAttempts,
    });

    let nc: NatsConnection;
    try {
      nc = await connect(options);
    } catch (error) {
      throw toConnectionError(error, { servers: servers.map(maskUrl) });
    }

    const adapter = new NatsConnectionAdapter(nc, this.logger);
    this.connection = adapter;
    this.closedPromise = this.watchClosed(nc);
    this.watchStatus(nc, adapter).catch((error: unknown) => {
      this.logger.error('Status monitor stopped', asError(error));
    });

    this.logger.debug('Connected to NATS', { server: nc.getServer() });
    return adapter;
  }

  private async watchStatus(nc: NatsConnection, adapter: NatsConnectionAdapter): Promise<void> {
    const minutes = Math.round(this.config.reconnectWindow / 60_000);

    for await (const status of nc.status()) {
      switch (status.type) {
        case Events.Disconnect:
          this.logger.info(`Disconnected: will attempt reconnects for ${minutes}m`);
          this.emit('disconnected');
          break;
        case Events.Reconnect: {
          const server = typeof status.data === 'string' ? status.data : nc.getServer();
          this.logger.info(`Reconnected [${server}]`);
          this.emit('reconnected', server);
          break;
        }
        case Events.Error: {
          const message = describeServerError(status);
          this.logger.debug('Server reported an error', { error: message });
          adapter.recordError(message);
          this.emit('serverError', message);
          break;
        }
        default:
          break;
      }
    }
  }

  private async watchClosed(nc: NatsConnection): Promise<Error | undefined> {
    const error = await nc.closed();
    this.connection = null;

    if (this.isClosing) {
      return undefined;
    }

    const reason =
      error instanceof Error
        ? error
        : ConnectionError.closed('connection closed', { name: this.config.name });
    this.emit('closed', reason);
    return reason;
  }

  /**
   * Wait for the connection to go away
   *
   * Resolves with the reason when the connection closed on its own (for example
   * after reconnect attempts ran out), or `undefined` after close().
   */
  closed(): Promise<Error | undefined> {
    return this.closedPromise ?? Promise.resolve(undefined);
  }

  isConnected(): boolean {
    return this.connection !== null;
  }

  /**
   * Close the connection. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.isClosing) return;
    this.isClosing = true;

    if (this.connection) {
      try {
        await this.connection.close();
        this.logger.debug('Connection closed');
      } catch (error) {
        this.logger.error('Error closing connection', asError(error));
      }
      this.connection = null;
    }
  }
}
