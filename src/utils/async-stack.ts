/**
 * Cleanup stack for resources an agent opens while resolving its tools
 */

export type AsyncDisposeFn = () => Promise<void>;

/**
 * Runs registered cleanups in reverse order (LIFO).
 * Every cleanup runs even when an earlier one fails; the failures are
 * rethrown together once the stack is empty.
 */
export class AsyncDisposableStack {
  private stack: AsyncDisposeFn[] = [];
  private disposed = false;

  /**
   * Register a resource; its Symbol.asyncDispose runs during cleanup
   */
  use<T extends AsyncDisposable>(resource: T): T {
    this.pushCallback(() => resource[Symbol.asyncDispose]());
    return resource;
  }

  pushCallback(callback: AsyncDisposeFn): void {
    if (this.disposed) {
      throw new Error('Cannot push callback on disposed stack');
    }

    this.stack.push(callback);
  }

  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }

    this.disposed = true;
    const errors: Error[] = [];

    for (let cleanup = this.stack.pop(); cleanup; cleanup = this.stack.pop()) {
      try {
        await cleanup();
      } catch (error) {
        errors.push(error instanceof Error ? error : new Error(String(error)));
      }
    }

    if (errors.length === 1) {
      throw errors[0];
    } else if (errors.length > 1) {
      throw new AggregateError(errors, `${errors.length} errors occurred during disposal`);
    }
  }

  [Symbol.asyncDispose](): Promise<void> {
    return this.dispose();
  }

  get size(): number {
    return this.stack.length;
  }
}
