import { basename } from 'path';
import { TOOL_NAMES } from '../core/constants';

export type ToolMode = 'publish' | 'subscribe' | 'request' | 'reply';

const SUFFIX_MODES: Record<string, ToolMode> = {
  '-pub': 'publish',
  '-sub': 'subscribe',
  '-req': 'request',
  rply: 'reply',
};

const USAGE_LINES: Record<ToolMode, string> = {
  publish: 'Usage: nats-pub [-s server] [-creds file] [-t] <subject> <msg>',
  subscribe: 'Usage: nats-sub [-s server] [-creds file] [-t] <subject>',
  request: 'Usage: nats-req [-s server] [-creds file] [-t] <subject> <request>',
  reply: 'Usage: nats-rply [-s server] [-creds file] [-t] [-q queue] <subject> <response>',
};

/**
 * Pick the mode from the name the tool was invoked as
 *
 * `nats-sub`, `/usr/local/bin/my-sub` and `nats-sub.js` all select subscribe.
 * Names shorter than 7 characters, or with no known suffix, publish.
 */
export function detectMode(invocation: string): ToolMode {
  const name = basename(invocation)
    .toLowerCase()
    .replace(/\.(?:[cm]?js|ts)$/, '');

  if (name.length < 7) {
    return 'publish';
  }

  return SUFFIX_MODES[name.slice(-4)] ?? 'publish';
}

export function toolName(mode: ToolMode): string {
  return TOOL_NAMES[mode];
}

export function usageLine(mode: ToolMode): string {
  return USAGE_LINES[mode];
}

/**
 * Positional arguments each mode needs: a subject, plus a payload unless subscribing
 */
export function expectedArgCount(mode: ToolMode): number {
  return mode === 'subscribe' ? 1 : 2;
}
