// ============================================================================
// FILE: src/llm-client.ts
// PURPOSE: Chat-completion clients (OpenAI / Azure OpenAI) for answering
// ============================================================================

import { z } from 'zod';
import type { HttpPolicy, SaraConfig } from './config.js';
import { ConfigError, ProviderError } from './errors.js';
import { postJson, type FetchLike } from './http.js';
import { createLogger } from './logger.js';

export interface ChatMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface ChatOptions {
  temperature?: number;
  maxTokens?: number;
}

/**
 * ChatClient - Sends a conversation and returns the assistant's reply text
 */
export interface ChatClient {
  readonly model: string;
  complete(messages: ChatMessage[], options?: ChatOptions): Promise<string>;
}

const ChatResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullable(),
        }),
      })
    )
    .min(1),
});

function parseReply(json: unknown, label: string): string {
  const parsed = ChatResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new ProviderError(`${label} returned an unexpected response shape`);
  }
  const content = parsed.data.choices[0].message.content?.trim();
  if (!content) {
    throw new ProviderError(`${label} returned an empty completion`);
  }
  return content;
}

function requestBody(messages: ChatMessage[], options: ChatOptions): Record<string, unknown> {
  return {
    messages,
    temperature: options.temperature ?? 0.3,
    max_tokens: options.maxTokens ?? 4096,
  };
}

export interface ChatClientOptions {
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
}

export class OpenAIChatClient implements ChatClient {
  private readonly logger = createLogger('LLM');

  constructor(
    private readonly apiKey: string,
    readonly model: string,
    private readonly baseUrl: string,
    private readonly policy: HttpPolicy,
    private readonly options: ChatClientOptions = {}
  ) {}

  async complete(messages: ChatMessage[], options: ChatOptions = {}): Promise<string> {
    const json = await postJson(
      `${this.baseUrl}/chat/completions`,
      { Authorization: `Bearer ${this.apiKey}` },
      { model: this.model, ...requestBody(messages, options) },
      this.policy,
      { label: 'OpenAI chat', logger: this.logger, ...this.options }
    );
    return parseReply(json, 'OpenAI chat');
  }
}

export class AzureChatClient implements ChatClient {
  private readonly logger = createLogger('LLM');

  constructor(
    private readonly apiKey: string,
    private readonly endpoint: string,
    private readonly deployment: string,
    private readonly apiVersion: string,
    private readonly policy: HttpPolicy,
    private readonly options: ChatClientOptions = {}
  ) {}

  get model(): string {
    return this.deployment;
  }

  async complete(messages: ChatMessage[], options: ChatOptions = {}): Promise<string> {
    const url =
      `${this.endpoint}/openai/deployments/${encodeURIComponent(this.deployment)}/chat/completions` +
      `?api-version=${encodeURIComponent(this.apiVersion)}`;
    const json = await postJson(
      url,
      { 'api-key': this.apiKey },
      requestBody(messages, options),
      this.policy,
      { label: 'Azure OpenAI chat', logger: this.logger, ...this.options }
    );
    return parseReply(json, 'Azure OpenAI chat');
  }
}

/**
 * createChatClient - Build the chat client selected by SARA_PROVIDER
 *
 * @throws ConfigError when credentials for the selected provider are missing
 */
export function createChatClient(config: SaraConfig, options: ChatClientOptions = {}): ChatClient {
  if (config.provider === 'azure') {
    const { apiKey, endpoint } = config.azure;
    if (!apiKey || !endpoint) {
      throw new ConfigError('AZURE_API_KEY and AZURE_API_ENDPOINT must be set for the azure provider');
    }
    return new AzureChatClient(apiKey, endpoint, config.azure.chatDeployment, config.azure.apiVersion, config.http, options);
  }

  if (!config.openai.apiKey) {
    throw new ConfigError('OPENAI_API_KEY environment variable is not set');
  }
  return new OpenAIChatClient(config.openai.apiKey, config.chatModel, config.openai.baseUrl, config.http, options);
}
