/**
 * Unit tests for the command-line interface
 */

import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { createProgram } from '../../src/cli/program.js';
import { reportFailure } from '../../src/cli/report.js';
import { ConfigError } from '../../src/config.js';

const ANSI = new RegExp(String.raw`\u001b\[[0-9;]*m`, 'g');

describe('CLI', () => {
  let logged: string[];
  let errors: string[];

  beforeEach(() => {
    logged = [];
    errors = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      logged.push(args.map(String).join(' ').replace(ANSI, ''));
    });
    vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
      errors.push(args.map(String).join(' ').replace(ANSI, ''));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it('should register the commands with chat as default', () => {
    const program = createProgram();

    expect(program.name()).toBe('ponder');
    expect(program.commands.map((command) => command.name())).toEqual(['chat', 'calc', 'tools', 'serve']);
  });

  describe('calc', () => {
    it('should print the result', async () => {
      await createProgram().parseAsync(['calc', '2', '**', '10'], { from: 'user' });

      expect(logged).toEqual(['1024']);
      expect(process.exitCode).toBeUndefined();
    });

    it('should print the error and fail', async () => {
      await createProgram().parseAsync(['calc', '10 / 0'], { from: 'user' });

      expect(errors).toEqual(['Error: division by zero']);
      expect(process.exitCode).toBe(1);
    });
  });

  describe('tools', () => {
    it('should list the built-in tools', async () => {
      await createProgram().parseAsync(['tools', '--no-mcp'], { from: 'user' });

      expect(logged).toEqual([
        'Tools (2):',
        '  - calculate: Calculate the result of a mathematical expression.',
        '  - get_current_time: Get the current time and date.',
      ]);
    });
  });

  describe('reportFailure', () => {
    it('should label configuration errors', () => {
      reportFailure(new ConfigError('No model backend configured', ['set OPENAI_API_KEY']));

      expect(errors).toEqual(['Configuration error: No model backend configured: set OPENAI_API_KEY']);
      expect(process.exitCode).toBe(1);
    });

    it('should print other errors', () => {
      reportFailure(new Error('port in use'));

      expect(errors).toEqual(['Error: port in use']);
    });
  });
});
