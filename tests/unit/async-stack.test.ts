/**
 * Unit tests for the disposal stack
 */

import { describe, it, expect } from 'vitest';
import { AsyncDisposableStack } from '../../src/utils/async-stack.js';

describe('AsyncDisposableStack', () => {
  it('should dispose callback in order', async () => {
    const disposed: number[] = [];
    const stack = new AsyncDisposableStack();

    stack.pushCallback(async () => {
      disposed.push(1);
    });
    stack.pushCallback(async () => {
      disposed.push(2);
    });

    await stack.dispose();

    expect(disposed).toEqual([2, 1]);
    expect(stack.size).toBe(0);
  });

  it('should support Symbol.asyncDispose', async () => {
    const disposed: boolean[] = [];
    const stack = new AsyncDisposableStack();

    stack.pushCallback(async () => {
      disposed.push(true);
    });

    await stack[Symbol.asyncDispose]();

    expect(disposed).toEqual([true]);
  });

  it('should handle empty stack', async () => {
    const stack = new AsyncDisposableStack();
    await expect(stack.dispose()).resolves.toBeUndefined();
  });

  it('should dispose resources registered with use', async () => {
    let closed = false;
    const stack = new AsyncDisposableStack();
    const resource = {
      async [Symbol.asyncDispose]() {
        closed = true;
      },
    };

    expect(stack.use(resource)).toBe(resource);
    await stack.dispose();

    expect(closed).toBe(true);
  });

  it('should run every callback and rethrow a single failure', async () => {
    const disposed: number[] = [];
    const stack = new AsyncDisposableStack();

    stack.pushCallback(async () => {
      disposed.push(1);
    });
    stack.pushCallback(async () => {
      throw new Error('close failed');
    });

    await expect(stack.dispose()).rejects.toThrow('close failed');
    expect(disposed).toEqual([1]);
  });

  it('should aggregate several failures', async () => {
    const stack = new AsyncDisposableStack();

    stack.pushCallback(async () => {
      throw new Error('first');
    });
    stack.pushCallback(async () => {
      throw new Error('second');
    });

    await expect(stack.dispose()).rejects.toThrow('2 errors occurred during disposal');
  });

  it('should refuse callbacks after disposal and dispose only once', async () => {
    let count = 0;
    const stack = new AsyncDisposableStack();
    stack.pushCallback(async () => {
      count++;
    });

    await stack.dispose();
    await stack.dispose();

    expect(count).toBe(1);
    expect(() => stack.pushCallback(async () => {})).toThrow('Cannot push callback on disposed stack');
  });
});
