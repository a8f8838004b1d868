/**
 * Unit tests for per-thread conversation memory
 */

import { describe, it, expect } from 'vitest';
import { InMemoryCheckpointer } from '../../src/core/checkpoint.js';
import type { ChatMessage } from '../../src/core/models.js';

const user = (content: string): ChatMessage => ({ role: 'user', content });
const assistant = (content: string): ChatMessage => ({ role: 'assistant', content });

describe('InMemoryCheckpointer', () => {
  it('should return an empty history for unknown threads', async () => {
    const checkpointer = new InMemoryCheckpointer();
    expect(await checkpointer.get('missing')).toEqual([]);
  });

  it('should keep threads separate', async () => {
    const checkpointer = new InMemoryCheckpointer();

    await checkpointer.put('a', [user('hi from a')]);
    await checkpointer.put('b', [user('hi from b')]);

    expect(await checkpointer.get('a')).toEqual([user('hi from a')]);
    expect(await checkpointer.get('b')).toEqual([user('hi from b')]);
    expect(await checkpointer.list()).toEqual(['a', 'b']);
  });

  it('should never store system messages', async () => {
    const checkpointer = new InMemoryCheckpointer();

    await checkpointer.put('t', [{ role: 'system', content: 'be brief' }, user('hello'), assistant('hi')]);

    expect(await checkpointer.get('t')).toEqual([user('hello'), assistant('hi')]);
  });

  it('should return a copy of the stored history', async () => {
    const checkpointer = new InMemoryCheckpointer();
    await checkpointer.put('t', [user('hello')]);

    const history = await checkpointer.get('t');
    history.push(assistant('mutated'));

    expect(await checkpointer.get('t')).toHaveLength(1);
  });

  it('should keep tool message flags', async () => {
    const checkpointer = new InMemoryCheckpointer();

    await checkpointer.put('t', [
      { role: 'tool', content: '4', toolCallId: 'c1', name: 'calculate', argsWasValid: false, isError: true },
    ]);

    expect(await checkpointer.get('t')).toEqual([
      { role: 'tool', content: '4', toolCallId: 'c1', name: 'calculate', argsWasValid: false, isError: true },
    ]);
  });

  it('should delete a thread', async () => {
    const checkpointer = new InMemoryCheckpointer();
    await checkpointer.put('t', [user('hello')]);

    await checkpointer.delete('t');

    expect(await checkpointer.get('t')).toEqual([]);
    expect(await checkpointer.list()).toEqual([]);
  });

  describe('maxMessages', () => {
    it('should reject a window smaller than one message', () => {
      expect(() => new InMemoryCheckpointer({ maxMessages: 0 })).toThrow('maxMessages must be at least 1');
    });

    it('should keep the newest messages starting at a user message', async () => {
      const checkpointer = new InMemoryCheckpointer({ maxMessages: 4 });

      await checkpointer.put('t', [
        user('q1'),
        assistant('a1'),
        user('q2'),
        { role: 'assistant', content: '', toolCalls: [{ name: 'calculate', arguments: '{}', toolCallId: 'c1' }] },
        { role: 'tool', content: '4', toolCallId: 'c1', name: 'calculate', argsWasValid: true, isError: false },
        assistant('a2'),
      ]);

      const history = await checkpointer.get('t');
      expect(history.map((m) => m.role)).toEqual(['user', 'assistant', 'tool', 'assistant']);
      expect(history[0]).toEqual(user('q2'));
    });

    it('should not start the window on an orphaned tool result', async () => {
      const checkpointer = new InMemoryCheckpointer({ maxMessages: 3 });

      await checkpointer.put('t', [
        user('q1'),
        { role: 'assistant', content: '', toolCalls: [{ name: 'calculate', arguments: '{}', toolCallId: 'c1' }] },
        { role: 'tool', content: '4', toolCallId: 'c1', name: 'calculate', argsWasValid: true, isError: false },
        assistant('a1'),
        user('q2'),
      ]);

      expect(await checkpointer.get('t')).toEqual([user('q2')]);
    });
  });
});
