/**
 * Unit tests for the web chat wire protocol
 */

import { describe, it, expect } from 'vitest';
import { SYSTEM_TEXT, parseClientMessage } from '../../src/server/protocol.js';

describe('parseClientMessage', () => {
  it('should accept a chat message', () => {
    expect(parseClientMessage('{"type":"message","content":"What is 2 + 2?"}')).toEqual({
      ok: true,
      message: { type: 'message', content: 'What is 2 + 2?' },
    });
  });

  it('should accept a window message and keep extra fields', () => {
    expect(parseClientMessage('{"type":"window_message","data":{"site":"https://example.com","theme":"dark"}}')).toEqual({
      ok: true,
      message: { type: 'window_message', data: { site: 'https://example.com', theme: 'dark' } },
    });
  });

  it('should default missing window data', () => {
    expect(parseClientMessage('{"type":"window_message"}')).toEqual({
      ok: true,
      message: { type: 'window_message', data: {} },
    });
  });

  it('should reject malformed JSON', () => {
    expect(parseClientMessage('{not json')).toEqual({ ok: false, error: 'Invalid JSON message' });
  });

  it('should name the missing field', () => {
    expect(parseClientMessage('{"type":"message"}')).toEqual({ ok: false, error: 'Invalid message: content: Required' });
  });

  it('should reject unknown message types', () => {
    const result = parseClientMessage('{"type":"shutdown"}');

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error.startsWith('Invalid message: type: Invalid discriminator value')).toBe(true);
  });

  it('should reject frames that are not objects', () => {
    expect(parseClientMessage('[]')).toEqual({
      ok: false,
      error: 'Invalid message: message: Expected object, received array',
    });
  });
});

describe('SYSTEM_TEXT', () => {
  it('should format the dynamic notices', () => {
    expect(SYSTEM_TEXT.initFailed('no backend')).toBe('❌ Failed to initialize agent: no backend');
    expect(SYSTEM_TEXT.siteStored('https://example.com')).toBe(
      '✅ Site information received and stored: https://example.com'
    );
  });
});
