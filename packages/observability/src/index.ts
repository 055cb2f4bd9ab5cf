/**
 * @parley/observability - Observer implementations for parley.
 *
 * Console diagnostics, JSONL file logging with rotation, fan-out, and a
 * factory that builds the configured set.
 *
 * @packageDocumentation
 */

import type { IObserver, LogLevel } from '@parley/core';
import { ConsoleObserver } from './console-observer.js';
import { FileObserver } from './file-observer.js';
import { MultiObserver, NoopObserver } from './multi-observer.js';

export { ConsoleObserver, FileObserver, MultiObserver, NoopObserver };
export { expandHome } from './file-observer.js';
export type { ConsoleObserverOptions } from './console-observer.js';
export type { FileObserverOptions } from './file-observer.js';

export interface ObserverConfig {
  observers: string[];
  logLevel: LogLevel;
  logFile?: string;
}

/**
 * Build the observers named in config. Unknown names are ignored; an empty
 * list yields a NoopObserver and a single entry is returned unwrapped.
 */
export function createObserver(config: ObserverConfig): IObserver {
  const observers: IObserver[] = [];

  for (const name of config.observers) {
    switch (name) {
      case 'console':
        observers.push(new ConsoleObserver({ logLevel: config.logLevel }));
        break;
      case 'file':
        observers.push(new FileObserver({ filePath: config.logFile, logLevel: config.logLevel }));
        break;
      default:
        break;
    }
  }

  const [first] = observers;
  if (!first) return new NoopObserver();
  if (observers.length === 1) return first;
  return new MultiObserver(observers);
}
