// ============================================================================
// FILE: src/embeddings.ts
// PURPOSE: Record text preparation and embedding providers (OpenAI / Azure)
// ============================================================================

import { z } from 'zod';
import type { HttpPolicy, SaraConfig } from './config.js';
import { ConfigError, ProviderError } from './errors.js';
import { postJson, type FetchLike } from './http.js';
import { createLogger } from './logger.js';
import type { EntityRecord, Project } from './types.js';

// ----------------------------------------------------------------------------
// SECTION 1: TYPE DEFINITIONS
// ----------------------------------------------------------------------------

/**
 * EmbeddingProvider - Turns a text into a fixed-dimension vector
 *
 * The same provider/model must be used to build an index and to query it.
 * `model` is written into the index file so a mismatch can be detected.
 */
export interface EmbeddingProvider {
  readonly model: string;
  embed(text: string): Promise<number[]>;
}

/**
 * DEFAULT_CURRENCY - Grant amounts in the source data are in Polish zloty
 */
export const DEFAULT_CURRENCY = 'PLN';

// ----------------------------------------------------------------------------
// SECTION 2: TEXT PREPARATION
// ----------------------------------------------------------------------------

function describeProject(project: Project, currency: string): string | null {
  const title = project.title.trim();
  const years = project.years.trim();
  const amount = project.grant_amount;

  const extras: string[] = [];
  if (years) extras.push(years);
  if (amount !== null) extras.push(`${amount} ${currency}`);

  if (!title && extras.length === 0) return null;

  const label = title || '(untitled)';
  return extras.length > 0 ? `Project: ${label} (${extras.join(', ')})` : `Project: ${label}`;
}

/**
 * prepareRecordText - Convert an EntityRecord to embeddable text
 *
 * Fields are emitted in a fixed order so identical records always produce
 * identical text. Empty parts are left out; a record with no usable field
 * yields "" (see isDegenerateRecord).
 *
 * EXAMPLE OUTPUT:
 * "Name: Alice Nowak
 * Affiliation: Faculty of Mathematics and Computer Science
 * Research areas: fuzzy logic, NLP
 * Project: Fuzzy reasoning (2019-2022, 150000 PLN)"
 */
export function prepareRecordText(record: EntityRecord, currency: string = DEFAULT_CURRENCY): string {
  const parts: string[] = [];

  const name = record.name.trim();
  if (name) parts.push(`Name: ${name}`);

  const affiliation = record.affiliation.trim();
  if (affiliation) parts.push(`Affiliation: ${affiliation}`);

  const areas = record.research_areas.map(a => a.trim()).filter(a => a.length > 0);
  if (areas.length > 0) parts.push(`Research areas: ${areas.join(', ')}`);

  for (const project of record.projects) {
    const line = describeProject(project, currency);
    if (line) parts.push(line);
  }

  return parts.join('\n');
}

/**
 * isDegenerateRecord - True when a record has nothing to embed
 */
export function isDegenerateRecord(record: EntityRecord): boolean {
  return prepareRecordText(record) === '';
}

// ----------------------------------------------------------------------------
// SECTION 3: EMBEDDING PROVIDERS
// ----------------------------------------------------------------------------

const EmbeddingResponseSchema = z.object({
  data: z
    .array(
      z.object({
        index: z.number().int().optional(),
        embedding: z.array(z.number()),
      })
    )
    .min(1),
});

function parseEmbedding(json: unknown, label: string): number[] {
  const parsed = EmbeddingResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new ProviderError(`${label} returned an unexpected response shape`);
  }
  const vector = parsed.data.data[0].embedding;
  if (vector.length === 0) {
    throw new ProviderError(`${label} returned an empty embedding`);
  }
  return vector;
}

export interface ProviderOptions {
  fetchImpl?: FetchLike;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * OpenAIEmbeddingProvider - text-embedding-3-* over the public OpenAI API
 *
 * Returns 1536 dimensions for text-embedding-3-small, 3072 for -large.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  private readonly logger = createLogger('Embeddings');

  constructor(
    private readonly apiKey: string,
    readonly model: string,
    private readonly baseUrl: string,
    private readonly policy: HttpPolicy,
    private readonly options: ProviderOptions = {}
  ) {}

  async embed(text: string): Promise<number[]> {
    const json = await postJson(
      `${this.baseUrl}/embeddings`,
      { Authorization: `Bearer ${this.apiKey}` },
      { model: this.model, input: text },
      this.policy,
      { label: 'OpenAI embeddings', logger: this.logger, ...this.options }
    );
    return parseEmbedding(json, 'OpenAI embeddings');
  }
}

/**
 * AzureEmbeddingProvider - Embeddings from an Azure OpenAI deployment
 *
 * `model` reports the deployment name, which is what identifies the
 * embedding space on Azure.
 */
export class AzureEmbeddingProvider implements EmbeddingProvider {
  private readonly logger = createLogger('Embeddings');

  constructor(
    private readonly apiKey: string,
    private readonly endpoint: string,
    private readonly deployment: string,
    private readonly apiVersion: string,
    private readonly policy: HttpPolicy,
    private readonly options: ProviderOptions = {}
  ) {}

  get model(): string {
    return this.deployment;
  }

  async embed(text: string): Promise<number[]> {
    const url =
      `${this.endpoint}/openai/deployments/${encodeURIComponent(this.deployment)}/embeddings` +
      `?api-version=${encodeURIComponent(this.apiVersion)}`;
    const json = await postJson(
      url,
      { 'api-key': this.apiKey },
      { input: text },
      this.policy,
      { label: 'Azure OpenAI embeddings', logger: this.logger, ...this.options }
    );
    return parseEmbedding(json, 'Azure OpenAI embeddings');
  }
}

/**
 * createEmbeddingProvider - Build the provider selected by SARA_PROVIDER
 *
 * @throws ConfigError when the selected provider's credentials are missing
 */
export function createEmbeddingProvider(config: SaraConfig, options: ProviderOptions = {}): EmbeddingProvider {
  if (config.provider === 'azure') {
    const { apiKey, endpoint } = config.azure;
    if (!apiKey || !endpoint) {
      throw new ConfigError('AZURE_API_KEY and AZURE_API_ENDPOINT must be set for the azure provider');
    }
    return new AzureEmbeddingProvider(
      apiKey,
      endpoint,
      config.azure.embeddingDeployment,
      config.azure.apiVersion,
      config.http,
      options
    );
  }

  if (!config.openai.apiKey) {
    throw new ConfigError('OPENAI_API_KEY environment variable is not set');
  }
  return new OpenAIEmbeddingProvider(
    config.openai.apiKey,
    config.embeddingModel,
    config.openai.baseUrl,
    config.http,
    options
  );
}
