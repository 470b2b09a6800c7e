// ============================================================================
// FILE: src/test-utils.ts
// PURPOSE: Deterministic stand-ins for providers, shared by the test suites
// ============================================================================

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { EmbeddingProvider } from './embeddings.js';
import type { FetchLike } from './http.js';
import type { ChatClient, ChatMessage, ChatOptions } from './llm-client.js';
import type { EntityRecord } from './types.js';

/**
 * KeywordEmbeddingProvider - One dimension per vocabulary word
 *
 * Component i is 1 when the lower-cased text contains vocabulary[i], else 0.
 * Identical texts always give identical vectors.
 */
export class KeywordEmbeddingProvider implements EmbeddingProvider {
  readonly calls: string[] = [];

  constructor(
    private readonly vocabulary: string[],
    readonly model: string = 'keyword-stub'
  ) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    const lower = text.toLowerCase();
    return this.vocabulary.map(word => (lower.includes(word) ? 1 : 0));
  }
}

/**
 * FnEmbeddingProvider - Embeds with an arbitrary function
 */
export class FnEmbeddingProvider implements EmbeddingProvider {
  readonly calls: string[] = [];

  constructor(
    private readonly fn: (text: string, call: number) => number[],
    readonly model: string = 'fn-stub'
  ) {}

  async embed(text: string): Promise<number[]> {
    this.calls.push(text);
    return this.fn(text, this.calls.length - 1);
  }
}

/**
 * ScriptedChatClient - Replies from a function of the prompt
 */
export class ScriptedChatClient implements ChatClient {
  readonly model = 'chat-stub';
  readonly requests: Array<{ messages: ChatMessage[]; options: ChatOptions | undefined }> = [];

  constructor(private readonly reply: (prompt: string) => string) {}

  async complete(messages: ChatMessage[], options?: ChatOptions): Promise<string> {
    this.requests.push({ messages, options });
    return this.reply(messages[messages.length - 1].content);
  }
}

export function makeRecord(overrides: Partial<EntityRecord> = {}): EntityRecord {
  return {
    name: 'Test Researcher',
    affiliation: '',
    research_areas: [],
    projects: [],
    source: '',
    ...overrides,
  };
}

const tempDirs: string[] = [];

export async function makeTempDir(prefix = 'sara-test-'): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

/**
 * removeTempDirs - Delete every directory made by makeTempDir in this suite
 */
export async function removeTempDirs(): Promise<void> {
  const dirs = tempDirs.splice(0);
  await Promise.all(dirs.map(dir => fs.rm(dir, { recursive: true, force: true })));
}

export interface RecordedRequest {
  url: string;
  headers: Record<string, string>;
  body: unknown;
}

/**
 * scriptedFetch - Fake fetch returning queued responses and recording requests
 *
 * Each queue entry is a Response or an Error to throw.
 */
export function scriptedFetch(queue: Array<Response | Error>): { fetchImpl: FetchLike; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    const headers: Record<string, string> = {};
    new Headers(init.headers).forEach((value, key) => {
      headers[key] = value;
    });
    requests.push({
      url,
      headers,
      body: typeof init.body === 'string' ? JSON.parse(init.body) : null,
    });

    const next = queue.shift();
    if (next === undefined) {
      throw new Error('scriptedFetch: no response queued');
    }
    if (next instanceof Error) {
      throw next;
    }
    return next;
  };
  return { fetchImpl, requests };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}
