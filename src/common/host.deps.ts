/**
 * Host Dependencies
 * =================
 *
 * Small contracts injected into services instead of reaching for
 * console, Date.now or setTimeout directly. The server passes Fastify's
 * pino logger; library and test use fall back to the defaults below.
 */

export interface Logger {
  info: (obj: Record<string, unknown>, msg?: string) => void;
  warn: (obj: Record<string, unknown>, msg?: string) => void;
  error: (obj: Record<string, unknown>, msg?: string) => void;
  debug: (obj: Record<string, unknown>, msg?: string) => void;
}

export interface Clock {
  now: () => number; // milliseconds epoch
}

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

// ═══════════════════════════════════════════════════════════════
// DEFAULT IMPLEMENTATIONS
// ═══════════════════════════════════════════════════════════════

export const defaultLogger: Logger = {
  info: (obj, msg) => console.log(`[INFO] ${msg || ''}`, obj),
  warn: (obj, msg) => console.warn(`[WARN] ${msg || ''}`, obj),
  error: (obj, msg) => console.error(`[ERROR] ${msg || ''}`, obj),
  debug: (obj, msg) => console.debug(`[DEBUG] ${msg || ''}`, obj),
};

export const defaultClock: Clock = {
  now: () => Date.now(),
};

/**
 * setTimeout as a promise; rejects with the signal's reason on abort.
 */
export const defaultSleep: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
