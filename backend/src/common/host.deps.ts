/**
 * Host Dependencies Contract
 *
 * Services receive their logger and clock from the host process instead of
 * reaching for console or Date directly. Fastify's `app.log` satisfies Logger.
 */

// ═══════════════════════════════════════════════════════════════
// CORE INTERFACES
// ═══════════════════════════════════════════════════════════════

export interface Logger {
  info: (obj: unknown, msg?: string) => void;
  warn: (obj: unknown, msg?: string) => void;
  error: (obj: unknown, msg?: string) => void;
  debug?: (obj: unknown, msg?: string) => void;
}

export interface Clock {
  now: () => number; // milliseconds epoch
  utcNow: () => Date;
}

// ═══════════════════════════════════════════════════════════════
// DEFAULT IMPLEMENTATIONS
// ═══════════════════════════════════════════════════════════════

export function createConsoleLogger(tag: string): Logger {
  return {
    info: (obj, msg) => console.log(`[${tag}] ${msg || ''}`, obj),
    warn: (obj, msg) => console.warn(`[${tag}] ${msg || ''}`, obj),
    error: (obj, msg) => console.error(`[${tag}] ${msg || ''}`, obj),
    debug: (obj, msg) => console.debug(`[${tag}] ${msg || ''}`, obj),
  };
}

export const defaultLogger: Logger = createConsoleLogger('App');

export const defaultClock: Clock = {
  now: () => Date.now(),
  utcNow: () => new Date(),
};

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
