import type { RetryOptions } from './config.js';
import type { StartupLog } from './log.js';
import { errorMessage } from './errors.js';

const TRANSIENT_SOCKET_CODES = new Set(['ECONNREFUSED', 'ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN', 'EPIPE']);

// cannot_connect_now (server starting up), too_many_connections
const TRANSIENT_SQLSTATES = new Set(['57P03', '53300']);

function codeOf(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null || !('code' in e)) return undefined;
  const code = e.code;
  return typeof code === 'string' ? code : undefined;
}

export function isTransientDbError(e: unknown): boolean {
  const code = codeOf(e);
  if (code) {
    if (TRANSIENT_SOCKET_CODES.has(code) || TRANSIENT_SQLSTATES.has(code)) return true;
    // class 08: connection exception
    if (/^08[0-9A-Z]{3}$/.test(code)) return true;
  }
  const msg = errorMessage(e);
  return /Connection terminated|timeout exceeded when trying to connect/i.test(msg);
}

export function backoffMs(params: { baseMs: number; maxMs: number; attempt: number }): number {
  // attempt starts at 1
  const exp = Math.min(20, Math.max(0, params.attempt - 1));
  return Math.min(params.maxMs, params.baseMs * 2 ** exp);
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export async function withRetry<T>(
  label: string,
  fn: () => Promise<T>,
  opts: RetryOptions & { log?: StartupLog; sleep?: Sleep },
): Promise<T> {
  const wait = opts.sleep ?? sleep;
  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (e) {
      if (attempt >= opts.attempts || !isTransientDbError(e)) throw e;
      const delay = backoffMs({ baseMs: opts.baseMs, maxMs: opts.maxMs, attempt });
      opts.log?.warn(`${label} failed (attempt ${attempt}/${opts.attempts}): ${errorMessage(e)}; retrying in ${delay}ms`);
      await wait(delay);
    }
  }
}
