import { RequestCancelledError, UpstreamTimeoutError } from '../../types/errors.js';

/**
 * Deadline and cancellation for one upstream operation
 *
 * Combines an optional timeout with an optional parent signal (the inbound
 * request). Whatever the operation throws after the scope has aborted is
 * reported as a timeout or a cancellation instead.
 */
export class CallScope {
  private controller = new AbortController();
  private timer?: NodeJS.Timeout;
  private timedOut = false;
  private cancelled = false;
  private readonly onParentAbort = () => {
    this.cancelled = true;
    this.controller.abort();
  };

  constructor(
    private readonly timeoutMs?: number,
    private readonly parent?: AbortSignal,
    private readonly label: string = 'Upstream call'
  ) {
    if (parent?.aborted) {
      this.cancelled = true;
      this.controller.abort();
      return;
    }
    parent?.addEventListener('abort', this.onParentAbort, { once: true });

    if (timeoutMs !== undefined && timeoutMs > 0) {
      this.timer = setTimeout(() => {
        this.timedOut = true;
        this.controller.abort();
      }, timeoutMs);
    }
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isTimedOut(): boolean {
    return this.timedOut;
  }

  get isCancelled(): boolean {
    return this.cancelled;
  }

  get isAborted(): boolean {
    return this.timedOut || this.cancelled;
  }

  /**
   * Settle with the promise, or reject as soon as the scope aborts
   */
  race<T>(promise: Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const onAbort = () => reject(this.abortError());
      if (this.signal.aborted) {
        onAbort();
      } else {
        this.signal.addEventListener('abort', onAbort, { once: true });
      }
      // Still subscribed after an abort so a late rejection is not left unhandled
      promise.then(
        (value) => {
          this.signal.removeEventListener('abort', onAbort);
          resolve(value);
        },
        (error: unknown) => {
          this.signal.removeEventListener('abort', onAbort);
          reject(error);
        }
      );
    });
  }

  /**
   * Replace errors caused by the abort with the taxonomy error for it
   */
  translate(error: unknown): unknown {
    return this.isAborted ? this.abortError() : error;
  }

  dispose(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    this.parent?.removeEventListener('abort', this.onParentAbort);
  }

  private abortError(): UpstreamTimeoutError | RequestCancelledError {
    if (this.timedOut) {
      return new UpstreamTimeoutError(`${this.label} exceeded ${this.timeoutMs} ms`);
    }
    return new RequestCancelledError(`${this.label} was cancelled`);
  }
}
