/**
 * Environment configuration
 *
 * Values come from the process environment, optionally seeded from a .env
 * file, and are validated once at startup.
 */

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import {
  AGENT_MAX_TURNS,
  DEFAULT_AZURE_API_VERSION,
  DEFAULT_HOST,
  DEFAULT_MCP_SERVER_URL,
  DEFAULT_MODEL,
  DEFAULT_PORT,
} from './constants.js';
import { logger } from './utils/logging/logger.js';

/** Raised when the environment cannot produce a usable configuration */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
  }
}

/** Unset and empty variables are both treated as missing */
const optionalString = z.preprocess((v) => (v === '' ? undefined : v), z.string().optional());

const booleanFlag = z.preprocess(
  (v) => (typeof v === 'string' && v !== '' ? v.trim().toLowerCase() : undefined),
  z
    .enum(['true', 'false', '1', '0', 'yes', 'no', 'on', 'off'])
    .default('true')
    .transform((v) => v === 'true' || v === '1' || v === 'yes' || v === 'on')
);

const EnvSchema = z.object({
  AZURE_OPENAI_API_KEY: optionalString,
  AZURE_OPENAI_ENDPOINT: z.preprocess((v) => (v === '' ? undefined : v), z.string().url().optional()),
  AZURE_OPENAI_DEPLOYMENT_NAME: optionalString,
  OPENAI_API_VERSION: optionalString.transform((v) => v ?? DEFAULT_AZURE_API_VERSION),
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: z.preprocess((v) => (v === '' ? undefined : v), z.string().url().optional()),
  PONDER_MODEL: optionalString.transform((v) => v ?? DEFAULT_MODEL),
  PONDER_MAX_TURNS: z.preprocess(
    (v) => (v === '' || v === undefined ? AGENT_MAX_TURNS : v),
    z.coerce.number().int().positive()
  ),
  MCP_SERVER_URL: z.preprocess((v) => (v === '' || v === undefined ? DEFAULT_MCP_SERVER_URL : v), z.string().url()),
  MCP_ENABLED: booleanFlag,
  MCP_CONFIG: optionalString,
  MCP_SERVERS: optionalString.transform((v) =>
    v === undefined
      ? undefined
      : v
          .split(',')
          .map((name) => name.trim())
          .filter((name) => name !== '')
  ),
  X_API_KEY: optionalString,
  PONDER_HOST: optionalString.transform((v) => v ?? DEFAULT_HOST),
  PORT: z.preprocess(
    (v) => (v === '' || v === undefined ? DEFAULT_PORT : v),
    z.coerce.number().int().min(0).max(65_535)
  ),
  LOG_LEVEL: z.preprocess(
    (v) => (typeof v === 'string' && v !== '' ? v.toLowerCase() : 'info'),
    z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
  ),
});

export interface AzureSettings {
  apiKey: string;
  endpoint: string;
  deployment: string;
  apiVersion: string;
}

export interface OpenAISettings {
  apiKey: string;
  baseURL?: string;
}

export interface PonderConfig {
  /** Azure OpenAI deployment, when the full triple is set */
  azure?: AzureSettings;

  /** Plain OpenAI-compatible backend */
  openai?: OpenAISettings;

  model: string;
  maxTurns: number;

  mcp: {
    enabled: boolean;
    url: string;
    /** Extra HTTP headers for the MCP server */
    headers: Record<string, string>;
    /** JSON file with an `mcpServers` map, used instead of `url` when set */
    configPath?: string;
    /** Servers to connect to from the config file (default: all) */
    serverNames?: string[];
  };

  server: {
    host: string;
    port: number;
  };

  logLevel: z.infer<typeof EnvSchema>['LOG_LEVEL'];
}

/**
 * Validate an environment into a PonderConfig
 * @throws ConfigError listing each offending variable
 */
export function parseConfig(env: NodeJS.ProcessEnv): PonderConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError('Invalid configuration', issues);
  }
  const vars = parsed.data;

  const azureParts = [vars.AZURE_OPENAI_API_KEY, vars.AZURE_OPENAI_ENDPOINT, vars.AZURE_OPENAI_DEPLOYMENT_NAME];
  const azureSet = azureParts.filter((part) => part !== undefined).length;

  let azure: AzureSettings | undefined;
  if (vars.AZURE_OPENAI_API_KEY && vars.AZURE_OPENAI_ENDPOINT && vars.AZURE_OPENAI_DEPLOYMENT_NAME) {
    azure = {
      apiKey: vars.AZURE_OPENAI_API_KEY,
      endpoint: vars.AZURE_OPENAI_ENDPOINT,
      deployment: vars.AZURE_OPENAI_DEPLOYMENT_NAME,
      apiVersion: vars.OPENAI_API_VERSION,
    };
  } else if (azureSet > 0 && !vars.OPENAI_API_KEY) {
    const missing = [
      vars.AZURE_OPENAI_API_KEY === undefined ? 'AZURE_OPENAI_API_KEY' : undefined,
      vars.AZURE_OPENAI_ENDPOINT === undefined ? 'AZURE_OPENAI_ENDPOINT' : undefined,
      vars.AZURE_OPENAI_DEPLOYMENT_NAME === undefined ? 'AZURE_OPENAI_DEPLOYMENT_NAME' : undefined,
    ].filter((name): name is string => name !== undefined);
    throw new ConfigError(
      'Incomplete Azure OpenAI configuration',
      missing.map((name) => `${name}: Required`)
    );
  }

  const openai: OpenAISettings | undefined = vars.OPENAI_API_KEY
    ? { apiKey: vars.OPENAI_API_KEY, baseURL: vars.OPENAI_BASE_URL }
    : undefined;

  return {
    azure,
    openai,
    model: vars.PONDER_MODEL,
    maxTurns: vars.PONDER_MAX_TURNS,
    mcp: {
      enabled: vars.MCP_ENABLED,
      url: vars.MCP_SERVER_URL,
      headers: vars.X_API_KEY ? { 'x-api-key': vars.X_API_KEY } : {},
      configPath: vars.MCP_CONFIG,
      serverNames: vars.MCP_SERVERS,
    },
    server: {
      host: vars.PONDER_HOST,
      port: vars.PORT,
    },
    logLevel: env.NODE_ENV === 'test' ? 'silent' : vars.LOG_LEVEL,
  };
}

/**
 * Load `.env` (if present) into process.env, validate the result and apply
 * its log level to the shared logger.
 * Variables already set in the environment win over the file.
 */
export function loadConfig(options: { path?: string } = {}): PonderConfig {
  loadDotenv({ path: options.path });
  const config = parseConfig(process.env);
  // The shared logger is built before .env is read
  logger.level = config.logLevel;
  return config;
}

/**
 * Fail unless a model backend is configured
 */
export function requireModelBackend(config: PonderConfig): void {
  if (!config.azure && !config.openai) {
    throw new ConfigError('No model backend configured', [
      'set AZURE_OPENAI_API_KEY, AZURE_OPENAI_ENDPOINT and AZURE_OPENAI_DEPLOYMENT_NAME, or OPENAI_API_KEY',
    ]);
  }
}
