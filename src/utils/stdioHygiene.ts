/**
 * stdout carries JSON-RPC for the stdio transport, so anything logged there
 * breaks the protocol. Point the log-like console methods at stderr.
 */

import { LOG_PREFIX } from '../constants.js';

type ConsoleMethod = 'log' | 'info' | 'debug';

const ROUTED: readonly ConsoleMethod[] = ['log', 'info', 'debug'];

function routeToStderr(...args: unknown[]): void {
  console.error(...args);
}

/** Route console.log/info/debug to stderr; returns a function that undoes it. */
export function installStdioHygiene(): () => void {
  const saved = ROUTED.map(method => [method, console[method]] as const);
  for (const method of ROUTED) {
    if (console[method] !== routeToStderr) console[method] = routeToStderr;
  }
  return () => {
    for (const [method, original] of saved) console[method] = original;
  };
}

/** Prefixed diagnostic line on stderr. */
export function logServer(message: string, ...details: unknown[]): void {
  console.error(`${LOG_PREFIX} ${message}`, ...details);
}
