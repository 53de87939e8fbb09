import type { AppConfig } from './types.js';
import type { CompletionClient } from './analyzer/claude.js';
import { ClaudeCompletionClient, withRetry } from './analyzer/claude.js';

/** Everything a request handler needs, built once at startup and passed down. */
export interface AppContext {
  config: AppConfig;
  completion: CompletionClient;
  now: () => Date;
}

export function createContext(config: AppConfig, overrides: Partial<Omit<AppContext, 'config'>> = {}): AppContext {
  const completion =
    overrides.completion ??
    withRetry(
      new ClaudeCompletionClient({
        apiKey: config.anthropicApiKey,
        model: config.model,
        maxTokens: config.maxTokens,
        timeoutMs: config.timeoutMs,
      }),
      { delaysMs: config.retryDelaysMs },
    );
  return { config, completion, now: overrides.now ?? (() => new Date()) };
}
