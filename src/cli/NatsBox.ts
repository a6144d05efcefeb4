import { ConnectionManager, type ConnectionConfig } from '../core/connection/ConnectionManager';
import { ConsoleLogger, type LogWriter } from '../core/types/Logger';
import type { ConnectionLifecycle, MessagingConnection } from '../core/types/Messaging';
import { ConnectionError, UsageError } from '../core/errors';
import { VERSION } from '../core/constants';
import { Publisher } from '../client/pubsub/Publisher';
import { Requester } from '../client/rpc/Requester';
import { Subscriber } from '../server/pubsub/Subscriber';
import { Responder } from '../server/rpc/Responder';
import { type Environment, type ToolFlags, parseFlags } from './flags';
import { type ToolMode, detectMode, expectedArgCount, toolName } from './mode';
import { usageText } from './usage';

export type ConnectionFactory = (config: ConnectionConfig) => ConnectionLifecycle;

/**
 * NatsBox configuration
 */
export interface NatsBoxConfig {
  /** Path the tool was invoked as; selects the mode */
  invocation: string;
  /** Arguments after the invocation path */
  args: readonly string[];
  env?: Environment;
  logger?: ConsoleLogger;
  /** Where request replies are written */
  stdout?: LogWriter;
  createConnection?: ConnectionFactory;
}

const defaultConnectionFactory: ConnectionFactory = (config) => new ConnectionManager(config);

/**
 * NatsBox dispatches one run of the tool
 *
 * Publish and request modes resolve with exit code 0 once done. Subscribe and
 * reply modes keep running until the connection goes away; losing it without
 * having asked for it rejects with a ConnectionError.
 *
 * @example
 * ```typescript
 * const box = new NatsBox({
 *   invocation: '/usr/local/bin/nats-pub',
 *   args: ['-s', 'nats://localhost:4222', 'greetings', 'hello'],
 *   env: process.env,
 * });
 *
 * process.exitCode = await box.run();
 * ```
 */
export class NatsBox {
  private mode: ToolMode;
  private args: readonly string[];
  private env: Environment;
  private logger: ConsoleLogger;
  private stdout: LogWriter;
  private createConnection: ConnectionFactory;

  constructor(config: NatsBoxConfig) {
    this.mode = detectMode(config.invocation);
    this.args = config.args;
    this.env = config.env ?? {};
    this.logger = config.logger || new ConsoleLogger();
    this.stdout = config.stdout ?? process.stdout;
    this.createConnection = config.createConnection ?? defaultConnectionFactory;
  }

  getMode(): ToolMode {
    return this.mode;
  }

  /**
   * Run the tool
   *
   * @returns Process exit code
   * @throws {ConnectionError} When connecting fails or the connection is lost
   * @throws {RequestError} When a request gets no reply
   * @throws {PublishError} When a flush fails
   */
  async run(): Promise<number> {
    let flags: ToolFlags;
    try {
      flags = parseFlags(this.args, this.env);
    } catch (error) {
      if (error instanceof UsageError) {
        this.logger.info(error.message);
        this.printUsage();
        return 1;
      }
      throw error;
    }

    if (flags.help) {
      this.printUsage();
      return 0;
    }

    if (flags.version) {
      this.logger.info(`nats-box v${VERSION}`);
      return 0;
    }

    if (flags.args.length !== expectedArgCount(this.mode)) {
      this.printUsage();
      return 1;
    }

    const manager = this.createConnection({
      servers: flags.server,
      name: toolName(this.mode),
      credentialsFile: flags.credentials || undefined,
      logger: this.logger,
    });
    const connection = await manager.connect();

    if (this.mode === 'publish' || this.mode === 'request') {
      try {
        await this.runOnce(connection, flags);
      } finally {
        await manager.close();
      }
      return 0;
    }

    await this.listen(connection, flags);
    if (flags.timestamps) {
      this.logger.setTimestamps(true);
    }

    const reason = await manager.closed();
    if (reason) {
      throw ConnectionError.closed(`Exiting: ${reason.message}`, { mode: this.mode });
    }
    return 0;
  }

  private async runOnce(connection: MessagingConnection, flags: ToolFlags): Promise<void> {
    const [subject, payload] = flags.args;

    if (this.mode === 'request') {
      const requester = new Requester({ connection, logger: this.logger });
      const reply = await requester.request(subject, payload);
      this.stdout.write(Buffer.concat([reply, Buffer.from('\n')]));
      return;
    }

    const publisher = new Publisher({ connection, logger: this.logger });
    await publisher.publish(subject, payload);
  }

  private async listen(connection: MessagingConnection, flags: ToolFlags): Promise<void> {
    const [subject, response] = flags.args;

    if (this.mode === 'reply') {
      const responder = new Responder({
        connection,
        response,
        queue: flags.queue,
        logger: this.logger,
      });
      await responder.start(subject);
      return;
    }

    const subscriber = new Subscriber({ connection, logger: this.logger });
    await subscriber.start(subject);
  }

  private printUsage(): void {
    for (const line of usageText(this.mode, this.env)) {
      this.logger.info(line);
    }
  }
}
