import { PERSISTENCE_LIMITS } from '../config/defaults';
import {
  CancelledError,
  ConnectionError,
  TimeoutError,
  describeError,
  isCallerError,
  isPersistenceError
} from '../errors';
import type { Logger } from '../ports/logger';
import type { OperationOptions } from '../ports/persistence';

interface RunOperationInput<T> extends OperationOptions {
  label: string;
  run: (signal: AbortSignal) => Promise<T>;
}

/**
 * Runs `run` under the caller's signal and an optional deadline.
 *
 * The signal handed to `run` aborts when either fires, so gateways that can
 * cancel a request do so. The returned promise settles as soon as the deadline
 * or the caller's signal fires, even if the backend call is still running.
 * A non-finite `timeoutMs` means no deadline; longer ones are capped at the
 * largest delay a timer accepts.
 */
export function runOperation<T>(input: RunOperationInput<T>): Promise<T> {
  const { label, signal, timeoutMs } = input;

  if (signal?.aborted) {
    return Promise.reject(new CancelledError(label, { cause: signal.reason }));
  }

  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;
  let onAbort: (() => void) | undefined;

  return new Promise<T>((resolve, reject) => {
    const fail = (error: Error): void => {
      controller.abort(error);
      reject(error);
    };

    if (signal) {
      onAbort = () => fail(new CancelledError(label, { cause: signal.reason }));
      signal.addEventListener('abort', onAbort, { once: true });
    }

    if (timeoutMs !== undefined && Number.isFinite(timeoutMs) && timeoutMs > 0) {
      const delay = Math.min(timeoutMs, PERSISTENCE_LIMITS.MAX_TIMEOUT_MS);
      timer = setTimeout(() => fail(new TimeoutError(label, timeoutMs)), delay);
    }

    input.run(controller.signal).then(resolve, reject);
  }).finally(() => {
    if (timer !== undefined) clearTimeout(timer);
    if (signal && onAbort) signal.removeEventListener('abort', onAbort);
  });
}

/** Fills in the driver's default deadline when the caller gave none. */
export function withDefaultTimeout(options: OperationOptions | undefined, defaultTimeoutMs: number | undefined): OperationOptions {
  return {
    signal: options?.signal,
    timeoutMs: options?.timeoutMs ?? defaultTimeoutMs
  };
}

/** Wraps an unexpected backend failure as a `ConnectionError`; typed errors pass through. */
export function toConnectionError(error: unknown, label: string): Error {
  if (isPersistenceError(error)) return error;
  return new ConnectionError(`${label} failed: ${describeError(error)}`, { cause: error });
}

interface AttemptWriteInput {
  label: string;
  logger: Logger;
  context: Record<string, unknown>;
  options: OperationOptions;
  run: (signal: AbortSignal) => Promise<void>;
}

/**
 * Write path of save and delete: backend failures are logged and reported as
 * `false`. Caller errors (deadline, cancellation, misuse) still reject.
 */
export async function attemptWrite(input: AttemptWriteInput): Promise<boolean> {
  try {
    await runOperation({ label: input.label, ...input.options, run: input.run });
    return true;
  } catch (error) {
    if (isCallerError(error)) throw error;

    input.logger.error({ ...input.context, operation: input.label, err: error }, `${input.label} failed`);
    return false;
  }
}

interface AttemptReadInput<T> {
  label: string;
  options: OperationOptions;
  run: (signal: AbortSignal) => Promise<T>;
}

/** Read path of load and list: every failure surfaces as a typed error. */
export async function attemptRead<T>(input: AttemptReadInput<T>): Promise<T> {
  try {
    return await runOperation({ label: input.label, ...input.options, run: input.run });
  } catch (error) {
    throw toConnectionError(error, input.label);
  }
}
