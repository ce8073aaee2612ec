import { Logger } from "../config/logger";
import { InferenceCollaboratorError, errorMessage } from "../shared/errors";
import { delay, withTimeout } from "../shared/utils/async.util";

export interface RetryOptions {
  label: string;
  maxAttempts: number;
  /** Delay before attempt n+1 is backoffMs * 2^(n-1). */
  backoffMs: number;
  timeoutMs: number;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_TIMEOUT_MS = 8_000;

/**
 * Runs a collaborator call under a per-attempt timeout and retries any failure
 * until maxAttempts is reached. The final failure is rethrown as an
 * InferenceCollaboratorError.
 */
export async function callWithRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
  const timeoutMs = normalizeTimeout(options.timeoutMs);
  const sleep = options.sleep ?? delay;

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await withTimeout(
        operation(attempt),
        timeoutMs,
        () => new InferenceCollaboratorError("timeout", `${options.label} timed out after ${timeoutMs}ms`),
      );
    } catch (error) {
      const failure = toCollaboratorError(error, options.label);
      if (attempt >= maxAttempts) {
        throw failure;
      }
      const waitMs = backoffDelay(options.backoffMs, attempt);
      options.logger?.warn("llm.safe.retry", {
        label: options.label,
        attempt,
        waitMs,
        error_code: failure.code,
      });
      await sleep(waitMs);
    }
  }
}

export function backoffDelay(backoffMs: number, attempt: number): number {
  const base = Number.isFinite(backoffMs) && backoffMs > 0 ? backoffMs : 0;
  return base * 2 ** Math.max(0, attempt - 1);
}

export function tryParseJsonObject(raw: string): { ok: true; data: Record<string, unknown> } | { ok: false } {
  const text = raw.trim();
  const firstBrace = text.indexOf("{");
  const lastBrace = text.lastIndexOf("}");
  if (firstBrace < 0 || lastBrace < 0 || lastBrace <= firstBrace) {
    return { ok: false };
  }
  try {
    const parsed: unknown = JSON.parse(text.slice(firstBrace, lastBrace + 1));
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      return { ok: false };
    }
    return { ok: true, data: { ...parsed } };
  } catch {
    return { ok: false };
  }
}

export function toCollaboratorError(error: unknown, label: string): InferenceCollaboratorError {
  if (error instanceof InferenceCollaboratorError) {
    return error;
  }
  const message = `${label} failed: ${errorMessage(error)}`;
  if (isTimeoutError(error)) {
    return new InferenceCollaboratorError("timeout", message, { cause: error });
  }
  if (isTransientError(error)) {
    return new InferenceCollaboratorError("transient_failure", message, { cause: error });
  }
  return new InferenceCollaboratorError("collaborator_failure", message, { cause: error });
}

function normalizeTimeout(value: number): number {
  if (Number.isFinite(value) && value > 0) {
    return Math.round(value);
  }
  return DEFAULT_TIMEOUT_MS;
}

function isTimeoutError(error: unknown): boolean {
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return message.includes("timeout") || message.includes("timed out");
}

function isTransientError(error: unknown): boolean {
  const message = error instanceof Error ? error.message.toLowerCase() : "";
  return (
    message.includes("econnreset") ||
    message.includes("network") ||
    message.includes("429") ||
    message.includes("rate limit") ||
    message.includes("http 500") ||
    message.includes("http 502") ||
    message.includes("http 503") ||
    message.includes("http 504")
  );
}
