import { InvalidStateError } from './errors';

export type PersistencePhase = 'uninitialized' | 'initialized' | 'closed';

/**
 * Uninitialized -> Initialized -> Closed, owned by one driver instance.
 *
 * Tracks in-flight operations so `close()` can drain them before the pool is
 * disposed. Operations started after `close()` is called are rejected.
 */
export class PersistenceLifecycle {
  private current: PersistencePhase = 'uninitialized';
  private opening: Promise<void> | null = null;
  private closing: Promise<void> | null = null;
  private readonly inFlight = new Set<Promise<unknown>>();

  public constructor(private readonly owner: string) {}

  public get phase(): PersistencePhase {
    return this.current;
  }

  public get pendingOperations(): number {
    return this.inFlight.size;
  }

  /**
   * Runs `open` unless an attempt is already pending, in which case callers
   * share it. A failed attempt leaves the phase untouched so it can be retried.
   */
  public initialize(open: () => Promise<void>): Promise<void> {
    if (this.current === 'closed') {
      return Promise.reject(new InvalidStateError(`${this.owner} cannot be initialized after close()`));
    }
    if (this.opening) return this.opening;

    const attempt = open().then(() => {
      if (this.current === 'uninitialized') {
        this.current = 'initialized';
      }
    });

    this.opening = attempt;
    const clear = (): void => {
      if (this.opening === attempt) this.opening = null;
    };
    attempt.then(clear, clear);

    return attempt;
  }

  public assertInitialized(operation: string): void {
    if (this.current === 'uninitialized') {
      throw new InvalidStateError(`${this.owner}.${operation}() called before initialize()`);
    }
    if (this.current === 'closed') {
      throw new InvalidStateError(`${this.owner}.${operation}() called after close()`);
    }
  }

  public track<T>(operation: string, run: () => Promise<T>): Promise<T> {
    try {
      this.assertInitialized(operation);
    } catch (error) {
      return Promise.reject(error);
    }

    const pending = run();
    this.inFlight.add(pending);
    const release = (): void => {
      this.inFlight.delete(pending);
    };
    pending.then(release, release);

    return pending;
  }

  /**
   * Flips to `closed` immediately, waits for a pending `initialize()` and every
   * tracked operation to settle, then runs `dispose` once.
   */
  public close(dispose: () => Promise<void>): Promise<void> {
    if (this.closing) return this.closing;

    this.current = 'closed';
    const waitFor: Array<Promise<unknown>> = [...this.inFlight];
    if (this.opening) waitFor.push(this.opening);

    this.closing = Promise.allSettled(waitFor).then(() => dispose());
    return this.closing;
  }
}
