import { ConsoleLogger, type LogWriter } from '../core/types/Logger';
import { asError } from '../core/errors';
import { type ConnectionFactory, NatsBox } from './NatsBox';
import type { Environment } from './flags';

export { NatsBox } from './NatsBox';
export type { ConnectionFactory, NatsBoxConfig } from './NatsBox';
export { parseFlags, flagDefaults, FLAG_DEFINITIONS } from './flags';
export type { Environment, ToolFlags, FlagDefinition, FlagName } from './flags';
export { detectMode, toolName, usageLine, expectedArgCount } from './mode';
export type { ToolMode } from './mode';
export { usageText, flagDefaultLines } from './usage';

export interface MainOptions {
  logger?: ConsoleLogger;
  stdout?: LogWriter;
  createConnection?: ConnectionFactory;
}

/**
 * Run the tool for a `process.argv`-shaped argument list
 *
 * Never rejects: fatal errors are printed as a plain line, like the rest of
 * the tool output, and turned into exit code 1.
 */
export async function main(
  argv: readonly string[],
  env: Environment,
  options: MainOptions = {}
): Promise<number> {
  const logger = options.logger ?? new ConsoleLogger();
  const box = new NatsBox({
    invocation: argv[1] ?? '',
    args: argv.slice(2),
    env,
    logger,
    stdout: options.stdout,
    createConnection: options.createConnection,
  });

  try {
    return await box.run();
  } catch (error) {
    logger.info(asError(error).message);
    return 1;
  }
}
