// src/shared/errors.ts
export const PIPELINE_STATUSES = [
  'success',
  'blocked',
  'no_results',
  'context_error',
  'generation_error',
  'error',
] as const;

export type PipelineStatus = (typeof PIPELINE_STATUSES)[number];

/**
 * Failure raised inside the pipeline. `userMessage` is safe to show to the
 * caller; `message` may carry upstream details and only goes to the logs.
 */
export class PipelineError extends Error {
  constructor(
    readonly status: Exclude<PipelineStatus, 'success'>,
    readonly userMessage: string,
    message?: string,
    readonly cause?: unknown,
  ) {
    super(message ?? userMessage);
    this.name = 'PipelineError';
  }
}

export class UpstreamTimeoutError extends Error {
  constructor(
    readonly label: string,
    readonly timeoutMs: number,
  ) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'UpstreamTimeoutError';
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

export function errorStack(e: unknown): string | undefined {
  return e instanceof Error ? e.stack : undefined;
}

/**
 * Races `promise` against a timer. The timer is always cleared so nothing is
 * left pending once the call settles.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  label: string,
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new UpstreamTimeoutError(label, timeoutMs)),
      timeoutMs,
    );
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    if (timer) clearTimeout(timer);
  }
}
