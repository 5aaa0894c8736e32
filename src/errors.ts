/**
 * Error taxonomy.
 *
 * ValidationError surfaces to callers verbatim. Everything else is absorbed by
 * the orchestrator into a degraded result; ConcurrencyConflictError never
 * leaves the lock layer. An owner without records is not an error: the query
 * is accepted with an empty ranked set.
 */

export type ErrorCode =
  | "VALIDATION"
  | "COLLABORATOR_TIMEOUT"
  | "CONCURRENCY_CONFLICT";

export class ChartRecallError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ValidationError extends ChartRecallError {
  readonly field: string;

  constructor(field: string, message: string) {
    super("VALIDATION", message);
    this.field = field;
  }
}

export class CollaboratorTimeoutError extends ChartRecallError {
  readonly collaborator: string;
  readonly timeoutMs: number;

  constructor(collaborator: string, timeoutMs: number, options?: { cause?: unknown }) {
    super("COLLABORATOR_TIMEOUT", `${collaborator} did not respond within ${timeoutMs}ms`, options);
    this.collaborator = collaborator;
    this.timeoutMs = timeoutMs;
  }
}

export class ConcurrencyConflictError extends ChartRecallError {
  readonly key: string;

  constructor(key: string, waitedMs: number) {
    super("CONCURRENCY_CONFLICT", `lock for ${key} not acquired within ${waitedMs}ms`);
    this.key = key;
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Bound a collaborator call. The factory gets a signal that aborts at the
 * deadline so well-behaved collaborators (fetch) stop their work too.
 */
export async function withTimeout<T>(
  run: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  collaborator: string,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new CollaboratorTimeoutError(collaborator, timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });
  try {
    return await Promise.race([run(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
