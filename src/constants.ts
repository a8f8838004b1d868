/**
 * Global constants for Ponder
 */

/** Default maximum number of model turns per agent run */
export const AGENT_MAX_TURNS = 25;

/** Thread used when the caller does not name one */
export const DEFAULT_THREAD_ID = '1';

/** Default chat model */
export const DEFAULT_MODEL = 'gpt-4.1';

/** Azure OpenAI API version used when none is configured */
export const DEFAULT_AZURE_API_VERSION = '2024-02-01';

/** Default MCP endpoint (streamable HTTP) */
export const DEFAULT_MCP_SERVER_URL = 'http://localhost:3000/mcp';

/** Default web chat bind address */
export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 8000;

/** Words that end the terminal chat loop */
export const EXIT_COMMANDS = ['quit', 'exit', 'q'] as const;

/** Longest expression the calculator will look at */
export const MAX_EXPRESSION_LENGTH = 1000;

/** Deepest parenthesis / call / unary nesting the parser will follow */
export const MAX_NESTING_DEPTH = 64;

/** Largest integer result, in bits */
export const MAX_INTEGER_BITS = 16_384;

/** Retry configuration */
export const MAX_RETRY_ATTEMPTS = 3;
export const RETRY_MIN_TIMEOUT = 1000;
export const RETRY_MAX_TIMEOUT = 10_000;
