/**
 * Retry with exponential backoff for encoder and store calls.
 * Only transient failures are retried: 429 and 5xx encoder responses, dropped
 * connections and the SQLSTATEs that signal a lost or aborted session.
 */

export interface RetryOpts {
  /** Maximum number of retry attempts (default 3) */
  maxRetries?: number;
  /** Initial backoff delay in ms (default 250) */
  initialDelayMs?: number;
  /** Maximum backoff delay in ms (default 5000) */
  maxDelayMs?: number;
  /** Backoff multiplier (default 2) */
  multiplier?: number;
  /** Jitter factor 0-1 (default 0.25) */
  jitter?: number;
  /** Override the transient-error check */
  isRetryable?: (err: Error) => boolean;
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
}

// SQLSTATE classes 08 (connection exception) and 57P (operator intervention).
const TRANSIENT_PG_CODE = /^(08\d{3}|57P0[1-3]|40001|40P01)$/;
const SQLSTATE = /^[0-9A-Z]{5}$/;

function errorCode(err: Error): string {
  if ("code" in err && typeof err.code === "string") return err.code;
  return "";
}

// HTTP status carried by encoder errors; store errors have none.
function errorStatus(err: Error): number | null {
  if ("status" in err && typeof err.status === "number") return err.status;
  return null;
}

export function isTransientError(err: unknown): boolean {
  if (!(err instanceof Error)) return false;
  const code = errorCode(err);
  if (code && (TRANSIENT_PG_CODE.test(code) || /^E(CONNRESET|CONNREFUSED|TIMEDOUT|PIPE)$/.test(code))) {
    return true;
  }
  // Any other SQLSTATE is a permanent database error.
  if (SQLSTATE.test(code)) return false;

  const status = errorStatus(err);
  if (status !== null) return status === 429 || status >= 500;

  const msg = err.message.toLowerCase();
  return (
    msg.includes("econnreset") ||
    msg.includes("econnrefused") ||
    msg.includes("etimedout") ||
    msg.includes("socket hang up") ||
    msg.includes("connection terminated") ||
    msg.includes("timed out") ||
    msg.includes("fetch failed")
  );
}

interface BackoffOpts {
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
  jitter: number;
}

export function computeDelay(attempt: number, opts: BackoffOpts, random: () => number = Math.random): number {
  const baseDelay = Math.min(opts.initialDelayMs * Math.pow(opts.multiplier, attempt), opts.maxDelayMs);
  const jitterRange = baseDelay * opts.jitter;
  const jitter = (random() - 0.5) * 2 * jitterRange;
  return Math.max(0, Math.round(baseDelay + jitter));
}

export async function withRetry<T>(fn: () => Promise<T>, opts?: RetryOpts): Promise<T> {
  const maxRetries = opts?.maxRetries ?? 3;
  const backoff: BackoffOpts = {
    initialDelayMs: opts?.initialDelayMs ?? 250,
    maxDelayMs: opts?.maxDelayMs ?? 5_000,
    multiplier: opts?.multiplier ?? 2,
    jitter: opts?.jitter ?? 0.25,
  };
  const isRetryable = opts?.isRetryable ?? isTransientError;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      if (attempt >= maxRetries || !isRetryable(error)) throw error;

      const delay = computeDelay(attempt, backoff);
      opts?.onRetry?.(attempt + 1, error, delay);
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }
}
