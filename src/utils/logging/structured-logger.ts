/**
 * Structured logger with clean console output
 * Renders agent runs as boxes in the terminal, or as pino records
 */
const MAX_MESSAGE_LENGTH = 10_000;
const MAX_RESULT_LENGTH = 1000;
const getTerminalWidth = () => process.stdout.columns || 80;
import boxen from 'boxen';
import chalk from 'chalk';
import pino from 'pino';
import type { Agent, AgentEvents } from '../../core/agent.js';
import { TokenUsageMetadata, ToolUseCountMetadata } from '../../core/models.js';

export interface StructuredLoggerOptions {
  /** Logging level (default: 'info') */
  level?: 'trace' | 'debug' | 'info' | 'warn' | 'error';

  /** Enable pretty printing for development (default: true) */
  pretty?: boolean;

  /** Use clean console format instead of JSON (default: true) */
  useConsoleFormat?: boolean;

  /** Custom pino options (only used when useConsoleFormat is false) */
  pinoOptions?: pino.LoggerOptions;
}

type AgentEventHandlers = { [K in keyof AgentEvents]?: AgentEvents[K] };

const AGENT_EVENTS: Array<keyof AgentEvents> = [
  'run:start',
  'run:complete',
  'run:error',
  'turn:start',
  'turn:complete',
  'text:delta',
  'message:assistant',
  'message:tool',
  'tool:start',
  'tool:complete',
  'tool:error',
];

/**
 * Register handlers on an agent
 * @returns Function removing every registered handler
 */
function attach(agent: Agent, handlers: AgentEventHandlers): () => void {
  const detachers: Array<() => void> = [];

  const register = <E extends keyof AgentEvents>(event: E): void => {
    const handler = handlers[event];
    if (handler) {
      agent.on(event, handler);
      detachers.push(() => agent.off(event, handler));
    }
  };
  AGENT_EVENTS.forEach(register);

  return () => {
    for (const detach of detachers) detach();
  };
}

function truncate(text: string, limit: number): string {
  return text.length > limit ? text.substring(0, limit) + '...' : text;
}

/**
 * Create a console logger with clean, readable output
 * @internal
 */
function createConsoleLogger(agent: Agent, level: string): () => void {
  const verbose = level === 'debug' || level === 'trace';
  const runData: {
    startTime?: number;
    currentTurn?: number;
    maxTurns?: number;
  } = {};

  const box = (content: string, title: string, borderColor: string): string =>
    boxen(content, {
      padding: { top: 0, bottom: 0, left: 1, right: 1 },
      borderStyle: 'round',
      borderColor,
      title,
      titleAlignment: 'left',
      width: getTerminalWidth(),
    });

  return attach(agent, {
    'run:start': (data) => {
      runData.startTime = Date.now();
      console.log(`🚀 Starting agent [${agent.getName()}] on thread ${data.threadId}...`);
      if (verbose) {
        console.log(`   Input: ${truncate(data.input, MAX_MESSAGE_LENGTH)}`);
      }
      console.log();
    },

    'turn:start': (data) => {
      runData.currentTurn = data.turn + 1;
      runData.maxTurns = data.maxTurns;
    },

    'message:assistant': (data) => {
      const contentParts: string[] = [];

      if (data.content.length > 0) {
        contentParts.push(truncate(data.content, MAX_MESSAGE_LENGTH));
      }

      if (data.toolCalls && data.toolCalls.length > 0) {
        if (contentParts.length > 0) contentParts.push('');
        contentParts.push(chalk.gray('Tool Calls:'));
        for (const tc of data.toolCalls) {
          contentParts.push(`  🔧 ${chalk.yellow(tc.name)}`);
          contentParts.push(chalk.gray(`     ${truncate(tc.arguments, MAX_RESULT_LENGTH).replace(/\n/g, '\\n')}`));
        }
      }

      if (contentParts.length > 0) {
        const title = `AssistantMessage │ ${agent.getName()} │ Turn ${runData.currentTurn ?? '?'}/${runData.maxTurns ?? '?'}`;
        console.log(box(contentParts.join('\n'), title, 'cyan'));
      }
    },

    'tool:complete': (data) => {
      const result =
        data.result.length > MAX_RESULT_LENGTH
          ? data.result.substring(0, 500) + '\n...\n' + data.result.substring(data.result.length - 500)
          : data.result;

      const statusIcon = data.success ? chalk.green('✓') : chalk.red('✗');
      const turnInfo = runData.currentTurn ? ` │ Turn ${runData.currentTurn}/${runData.maxTurns}` : '';
      console.log(box(result, `${statusIcon} ToolResult │ ${data.name}${turnInfo}`, data.success ? 'green' : 'red'));
    },

    'turn:complete': (data) => {
      if (data.tokenUsage && verbose) {
        const { input, output } = data.tokenUsage;
        console.log(`  📊 Tokens: ${input} in, ${output} out, ${input + output} total\n`);
      }
    },

    'tool:error': (data) => {
      console.log(`  ❌ ${data.name}: ${data.error.message}`);
    },

    'run:complete': (data) => {
      const duration = Date.now() - (runData.startTime ?? Date.now());
      const termWidth = getTerminalWidth();

      console.log('═'.repeat(termWidth));
      console.log(`✅ Agent Complete (${duration}ms)`);
      console.log('═'.repeat(termWidth));

      const tools = Object.entries(data.result.runMetadata)
        .flatMap(([name, value]) => (value instanceof ToolUseCountMetadata ? [{ name, uses: value.numUses }] : []))
        .filter((t) => t.uses > 0);
      const toolContent =
        tools.length > 0
          ? tools.map(({ name, uses }) => `${name} ${uses} call${uses === 1 ? '' : 's'}`).join('\n')
          : 'No tools used';
      console.log(box(toolContent, 'Tool Usage', 'gray'));

      const tokenUsage = data.result.runMetadata.token_usage;
      const tokenContent =
        tokenUsage instanceof TokenUsageMetadata
          ? `Input   ${tokenUsage.input.toLocaleString().padStart(10)}\nOutput  ${tokenUsage.output.toLocaleString().padStart(10)}\nTotal   ${tokenUsage.total.toLocaleString().padStart(10)}`
          : 'No token usage data';
      console.log(box(tokenContent, 'Token Usage', 'gray'));

      console.log();
    },

    'run:error': (data) => {
      console.log(`❌ Agent error: ${data.error.message}`);
      if (verbose) {
        console.log(data.error.stack);
      }
    },
  });
}

/**
 * Create a structured logger that listens to agent events
 * @param agent - The agent to monitor
 * @param options - Logger configuration
 * @returns Cleanup function to remove event listeners
 */
export function createStructuredLogger(agent: Agent, options: StructuredLoggerOptions = {}): () => void {
  const { level = 'info', pretty = true, useConsoleFormat = true, pinoOptions = {} } = options;

  // Use clean console format by default
  if (useConsoleFormat) {
    return createConsoleLogger(agent, level);
  }

  // Fallback to Pino for JSON logging
  const logger = pino({
    level,
    ...pinoOptions,
    ...(pretty && {
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss',
          ignore: 'pid,hostname',
        },
      },
    }),
  });

  return attach(agent, {
    'run:start': (data) => {
      logger.info(
        {
          event: 'run:start',
          agent: agent.getName(),
          threadId: data.threadId,
          input: data.input.substring(0, MAX_MESSAGE_LENGTH),
        },
        'Agent run started'
      );
    },

    'run:complete': (data) => {
      logger.info(
        {
          event: 'run:complete',
          threadId: data.result.threadId,
          duration: data.duration,
          messageCount: data.result.messages.length,
          tokenUsage: data.result.runMetadata.token_usage,
        },
        `Agent run completed in ${data.duration}ms`
      );
    },

    'run:error': (data) => {
      logger.error(
        {
          event: 'run:error',
          error: {
            message: data.error.message,
            stack: data.error.stack,
            name: data.error.name,
          },
          duration: data.duration,
        },
        `Agent run failed: ${data.error.message}`
      );
    },

    'turn:start': (data) => {
      logger.debug(
        {
          event: 'turn:start',
          turn: data.turn + 1,
          maxTurns: data.maxTurns,
          progress: `${data.turn + 1}/${data.maxTurns}`,
        },
        `Turn ${data.turn + 1}/${data.maxTurns} started`
      );
    },

    'turn:complete': (data) => {
      logger.debug(
        {
          event: 'turn:complete',
          turn: data.turn + 1,
          tokenUsage: data.tokenUsage,
        },
        `Turn ${data.turn + 1} completed`
      );
    },

    'message:assistant': (data) => {
      logger.trace(
        {
          event: 'message:assistant',
          content: data.content.substring(0, MAX_MESSAGE_LENGTH),
          toolCalls: data.toolCalls?.map((tc) => tc.name) ?? [],
        },
        'Assistant message'
      );
    },

    'message:tool': (data) => {
      logger.trace(
        {
          event: 'message:tool',
          toolName: data.name,
          success: data.success,
          content: data.content.substring(0, MAX_MESSAGE_LENGTH),
        },
        `Tool message: ${data.name}`
      );
    },

    'tool:start': (data) => {
      logger.debug(
        {
          event: 'tool:start',
          toolName: data.name,
          arguments: data.arguments,
        },
        `Executing tool: ${data.name}`
      );
    },

    'tool:complete': (data) => {
      logger.debug(
        {
          event: 'tool:complete',
          toolName: data.name,
          success: data.success,
          resultLength: data.result.length,
        },
        `Tool ${data.success ? 'succeeded' : 'failed'}: ${data.name}`
      );
    },

    'tool:error': (data) => {
      logger.warn(
        {
          event: 'tool:error',
          toolName: data.name,
          error: {
            message: data.error.message,
            name: data.error.name,
          },
        },
        `Tool error: ${data.name} - ${data.error.message}`
      );
    },
  });
}
