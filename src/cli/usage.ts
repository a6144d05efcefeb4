import { type Environment, FLAG_DEFINITIONS, flagDefaults } from './flags';
import { type ToolMode, usageLine } from './mode';

/**
 * One entry per flag, laid out like Go's `flag.PrintDefaults`
 *
 * ```
 *   -q string
 *     	Queue Group Name (default "NATS-RPLY-22")
 *   -t	Display timestamps
 * ```
 */
export function flagDefaultLines(env: Environment = {}): string[] {
  const defaults = flagDefaults(env);
  const stringDefaults: Record<string, string> = {
    s: defaults.server,
    creds: defaults.credentials,
    q: defaults.queue,
  };

  return FLAG_DEFINITIONS.map((definition) => {
    let line = `  -${definition.name}`;
    if (definition.kind === 'string') {
      line += ' string';
    }
    line += line.length <= 4 ? '\t' : '\n    \t';
    line += definition.usage;

    const defaultValue = stringDefaults[definition.name];
    if (definition.kind === 'string' && defaultValue) {
      line += ` (default ${JSON.stringify(defaultValue)})`;
    }
    return line;
  });
}

/**
 * Full help text for a mode: the usage line, then one entry per flag
 */
export function usageText(mode: ToolMode, env: Environment = {}): string[] {
  return [usageLine(mode), ...flagDefaultLines(env)];
}
