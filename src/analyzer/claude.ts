import Anthropic from '@anthropic-ai/sdk';
import type { CompletionPrompt } from './prompts.js';
import { CompletionFailedError, CredentialMissingError, PipelineError, describeError } from '../errors.js';

export const API_KEY_VARIABLE = 'ANTHROPIC_API_KEY';

export interface CompletionClient {
  complete(prompt: CompletionPrompt): Promise<string>;
}

interface MessageLike {
  content: ReadonlyArray<{ type: string; text?: string }>;
}

export type CreateMessage = (params: Anthropic.MessageCreateParamsNonStreaming) => Promise<MessageLike>;

export interface ClaudeOptions {
  apiKey: string | undefined;
  model: string;
  maxTokens: number;
  timeoutMs: number;
}

function sdkCreateMessage(apiKey: string, timeoutMs: number): CreateMessage {
  const client = new Anthropic({ apiKey, maxRetries: 0, timeout: timeoutMs });
  return (params) => client.messages.create(params);
}

/**
 * Single-attempt completion against the Messages API. A missing key fails
 * before any client is built; every SDK error becomes CompletionFailedError.
 */
export class ClaudeCompletionClient implements CompletionClient {
  private create: CreateMessage | undefined;

  constructor(
    private readonly options: ClaudeOptions,
    private readonly factory: (apiKey: string, timeoutMs: number) => CreateMessage = sdkCreateMessage,
  ) {}

  private messages(): CreateMessage {
    if (!this.options.apiKey) throw new CredentialMissingError(API_KEY_VARIABLE);
    this.create ??= this.factory(this.options.apiKey, this.options.timeoutMs);
    return this.create;
  }

  async complete(prompt: CompletionPrompt): Promise<string> {
    const create = this.messages();
    const estTokens = Math.round((prompt.system.length + prompt.human.length) / 4);
    console.log(`[llm] ${prompt.task}: calling ${this.options.model} (~${estTokens} input tokens)`);
    const started = Date.now();

    let message: MessageLike;
    try {
      message = await create({
        model: this.options.model,
        max_tokens: this.options.maxTokens,
        temperature: 0,
        system: prompt.system,
        messages: [{ role: 'user', content: prompt.human }],
      });
    } catch (err) {
      if (err instanceof PipelineError) throw err;
      const status = err instanceof Anthropic.APIError ? err.status : undefined;
      throw new CompletionFailedError(describeError(err), status, err);
    }

    const text = message.content
      .map((block) => (block.type === 'text' && typeof block.text === 'string' ? block.text : ''))
      .join('');
    if (!text) {
      throw new CompletionFailedError('response contained no text content');
    }
    console.log(`[llm] ${prompt.task}: ${text.length} characters in ${((Date.now() - started) / 1000).toFixed(2)}s`);
    return text;
  }
}

export interface RetryPolicy {
  delaysMs: number[];
  sleep?: (ms: number) => Promise<void>;
}

const sleepFor = (ms: number) => new Promise<void>((r) => setTimeout(r, ms));

export function isRetryable(err: unknown): boolean {
  if (!(err instanceof CompletionFailedError)) return false;
  const { status } = err;
  return status === undefined || status === 408 || status === 429 || status >= 500;
}

/** Bounded retry with backoff for transient completion failures. Credential errors are never retried. */
export function withRetry(client: CompletionClient, policy: RetryPolicy): CompletionClient {
  const sleep = policy.sleep ?? sleepFor;
  return {
    async complete(prompt) {
      for (let attempt = 0; ; attempt++) {
        try {
          return await client.complete(prompt);
        } catch (err) {
          if (!isRetryable(err) || attempt >= policy.delaysMs.length) throw err;
          const delay = policy.delaysMs[attempt];
          console.warn(
            `[llm] ${prompt.task}: ${describeError(err)}; waiting ${delay / 1000}s before retry ${attempt + 1}/${policy.delaysMs.length}`,
          );
          await sleep(delay);
        }
      }
    },
  };
}
