import { ConcurrencyError } from "../domain/errors";

/**
 * SessionLock serializes work per session id.
 *
 * Calls for the same id run one after another; calls for different ids
 * never wait on each other. A waiter that cannot start within `timeoutMs`
 * gets a ConcurrencyError (0 disables the timeout).
 */
export class SessionLock {
  // Tail of each session's queue; resolves when the last holder releases
  private tails = new Map<string, Promise<void>>();

  constructor(private readonly timeoutMs: number = 0) {}

  async runExclusive<T>(sessionId: string, work: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(sessionId) ?? Promise.resolve();

    let release: () => void = () => undefined;
    const held = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => held);
    this.tails.set(sessionId, tail);

    try {
      await this.waitFor(sessionId, previous);
      return await work();
    } finally {
      release();
      // A waiter that timed out releases only its own link; the entry goes
      // once the whole chain up to this link has settled
      void tail.then(() => {
        if (this.tails.get(sessionId) === tail) {
          this.tails.delete(sessionId);
        }
      });
    }
  }

  private waitFor(sessionId: string, previous: Promise<void>): Promise<void> {
    if (this.timeoutMs <= 0) {
      return previous;
    }

    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        reject(
          new ConcurrencyError(sessionId, `still running after ${this.timeoutMs}ms, try again`)
        );
      }, this.timeoutMs);

      previous.then(
        () => {
          clearTimeout(timer);
          resolve();
        },
        (err: unknown) => {
          clearTimeout(timer);
          reject(err);
        }
      );
    });
  }
}
