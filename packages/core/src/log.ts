/**
 * Logger for a single invocation.
 *
 * Diagnostics go through `debug` namespaces (gabi:http, gabi:input, gabi:run).
 * They are switched on by the verbosity handed to createLogger, not by the
 * DEBUG environment variable. Everything is written to stderr so stdout only
 * ever carries formatted results.
 */

import createDebug from 'debug';
import type { Debugger } from 'debug';
import { format } from 'node:util';

export type Verbosity = 'quiet' | 'normal' | 'debug';

export type LogNamespace = 'http' | 'input' | 'run';

export interface Logger {
  readonly verbosity: Verbosity;
  /** Informational note, hidden under quiet verbosity. */
  info(message: string): void;
  debug(namespace: LogNamespace, formatter: string, ...args: unknown[]): void;
}

export type LineWriter = (line: string) => void;

const writeStderr: LineWriter = (line) => {
  process.stderr.write(line);
};

export function createLogger(verbosity: Verbosity, write: LineWriter = writeStderr): Logger {
  const debuggers = new Map<LogNamespace, Debugger>();

  const debuggerFor = (namespace: LogNamespace): Debugger => {
    let instance = debuggers.get(namespace);
    if (!instance) {
      instance = createDebug(`gabi:${namespace}`);
      instance.enabled = verbosity === 'debug';
      instance.log = (...args: unknown[]) => write(`${format(...args)}\n`);
      debuggers.set(namespace, instance);
    }
    return instance;
  };

  return {
    verbosity,
    info(message) {
      if (verbosity !== 'quiet') {
        write(`${message}\n`);
      }
    },
    debug(namespace, formatter, ...args) {
      if (verbosity !== 'debug') return;
      debuggerFor(namespace)(formatter, ...args);
    },
  };
}

export const silentLogger: Logger = createLogger('quiet', () => {});
