/**
 * Helper utilities for examples
 */

import { createClient } from '../src/chat/responder.js';
import type { ChatCompletionsClient } from '../src/clients/openai-client.js';
import { ConfigError, loadConfig, type PonderConfig } from '../src/config.js';

/**
 * Load .env from the project root and validate it
 * Exits with a hint when no model backend is configured
 */
export function loadExampleConfig(): { config: PonderConfig; client: ChatCompletionsClient } {
  try {
    const config = loadConfig({ path: new URL('../.env', import.meta.url).pathname });
    return { config, client: createClient(config) };
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Error: ${error.message}`);
      console.error('Copy .env.example to .env and set AZURE_OPENAI_* or OPENAI_API_KEY');
      process.exit(1);
    }
    throw error;
  }
}
