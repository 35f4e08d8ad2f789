/**
 * core/logger.ts
 *
 * Singleton pino logger. Every module does:
 *     const log = scopedLogger('core/engine');
 *
 * Child loggers are scoped with a `module` field so logs
 * can be filtered per-module.
 */

import pino from 'pino';
import { SessionConfig } from './types';

let instance: pino.Logger | null = null;

export function initLogger(config: Pick<SessionConfig, 'logLevel' | 'transportMode'>): pino.Logger {
  // stdout carries JSON-RPC frames (stdio) or command output (cli); only http may log there
  const fd = config.transportMode === 'http' ? 1 : 2;
  instance = pino({ level: config.logLevel }, pino.destination(fd));
  return instance;
}

export function getLogger(): pino.Logger {
  if (!instance) {
    // Fallback for early imports before initLogger is called
    instance = pino({ level: process.env.LOG_LEVEL ?? 'info' }, pino.destination(2));
  }
  return instance;
}

/**
 * Returns a child logger scoped to a specific module.
 * Usage:  const log = scopedLogger('core/state_store');
 *
 * Modules create their logger at import time, before initLogger runs, so the
 * child is resolved on each access against whatever root is current.
 */
export function scopedLogger(moduleName: string): pino.Logger {
  const children = new WeakMap<pino.Logger, pino.Logger>();

  const resolve = (): pino.Logger => {
    const root = getLogger();
    let child = children.get(root);
    if (!child) {
      child = root.child({ module: moduleName });
      children.set(root, child);
    }
    return child;
  };

  return new Proxy({} as pino.Logger, {
    get(_target, prop) {
      const child = resolve();
      const value = Reflect.get(child, prop, child);
      return typeof value === 'function' ? value.bind(child) : value;
    }
  });
}
