// ============================================================================
// FILE: src/embeddings.test.ts
// PURPOSE: Record text preparation and embedding provider requests
// ============================================================================

import { loadConfig } from './config.js';
import {
  AzureEmbeddingProvider,
  OpenAIEmbeddingProvider,
  createEmbeddingProvider,
  isDegenerateRecord,
  prepareRecordText,
} from './embeddings.js';
import { ConfigError, ProviderError } from './errors.js';
import { jsonResponse, makeRecord, scriptedFetch } from './test-utils.js';

const policy = { timeoutMs: 1000, maxRetries: 0, backoffMs: 0 };

describe('prepareRecordText', () => {
  it('emits fields in a fixed order, one per line', () => {
    const text = prepareRecordText(
      makeRecord({
        name: 'Alice Nowak',
        affiliation: 'WMiI UAM',
        research_areas: ['fuzzy logic', 'NLP'],
        projects: [
          { title: 'Fuzzy reasoning', years: '2019-2022', grant_amount: 150000 },
          { title: 'Corpus tools', years: '', grant_amount: null },
        ],
        source: 'https://example.org/alice',
      })
    );

    expect(text).toBe(
      [
        'Name: Alice Nowak',
        'Affiliation: WMiI UAM',
        'Research areas: fuzzy logic, NLP',
        'Project: Fuzzy reasoning (2019-2022, 150000 PLN)',
        'Project: Corpus tools',
      ].join('\n')
    );
  });

  it('keeps a zero grant and uses the given currency', () => {
    const text = prepareRecordText(
      makeRecord({ name: 'Bob', projects: [{ title: 'Pilot', years: '', grant_amount: 0 }] }),
      'EUR'
    );
    expect(text).toBe('Name: Bob\nProject: Pilot (0 EUR)');
  });

  it('omits empty affiliation and blank research areas', () => {
    const text = prepareRecordText(makeRecord({ name: 'Carol', research_areas: ['  ', 'optics'] }));
    expect(text).toBe('Name: Carol\nResearch areas: optics');
  });

  it('is identical for identical records', () => {
    const a = makeRecord({ name: 'Dana', research_areas: ['NLP'] });
    const b = makeRecord({ name: 'Dana', research_areas: ['NLP'] });
    expect(prepareRecordText(a)).toBe(prepareRecordText(b));
  });
});

describe('isDegenerateRecord', () => {
  it('flags records with no usable fields', () => {
    expect(isDegenerateRecord(makeRecord({ name: '  ', source: 'https://example.org' }))).toBe(true);
  });

  it('accepts a record with only research areas', () => {
    expect(isDegenerateRecord(makeRecord({ name: '', research_areas: ['NLP'] }))).toBe(false);
  });
});

describe('OpenAIEmbeddingProvider', () => {
  it('posts the text and returns the first embedding', async () => {
    const { fetchImpl, requests } = scriptedFetch([jsonResponse({ data: [{ index: 0, embedding: [0.1, 0.2] }] })]);
    const provider = new OpenAIEmbeddingProvider('test-key', 'text-embedding-3-small', 'https://api.test/v1', policy, {
      fetchImpl,
    });

    const vector = await provider.embed('hello');

    expect(vector).toEqual([0.1, 0.2]);
    expect(requests).toHaveLength(1);
    expect(requests[0].url).toBe('https://api.test/v1/embeddings');
    expect(requests[0].headers.authorization).toBe('Bearer test-key');
    expect(requests[0].body).toEqual({ model: 'text-embedding-3-small', input: 'hello' });
  });

  it('rejects a response without embeddings', async () => {
    const { fetchImpl } = scriptedFetch([jsonResponse({ data: [] })]);
    const provider = new OpenAIEmbeddingProvider('test-key', 'm', 'https://api.test/v1', policy, { fetchImpl });

    await expect(provider.embed('hello')).rejects.toBeInstanceOf(ProviderError);
  });
});

describe('AzureEmbeddingProvider', () => {
  it('calls the deployment URL with the api-key header', async () => {
    const { fetchImpl, requests } = scriptedFetch([jsonResponse({ data: [{ embedding: [1, 2, 3] }] })]);
    const provider = new AzureEmbeddingProvider(
      'test-key',
      'https://example.openai.azure.com',
      'embed-small',
      '2024-12-01-preview',
      policy,
      { fetchImpl }
    );

    expect(await provider.embed('hi')).toEqual([1, 2, 3]);
    expect(provider.model).toBe('embed-small');
    expect(requests[0].url).toBe(
      'https://example.openai.azure.com/openai/deployments/embed-small/embeddings?api-version=2024-12-01-preview'
    );
    expect(requests[0].headers['api-key']).toBe('test-key');
    expect(requests[0].body).toEqual({ input: 'hi' });
  });
});

describe('createEmbeddingProvider', () => {
  it('requires an OpenAI key for the openai provider', () => {
    expect(() => createEmbeddingProvider(loadConfig({}))).toThrow(ConfigError);
  });

  it('requires endpoint and key for the azure provider', () => {
    expect(() => createEmbeddingProvider(loadConfig({ SARA_PROVIDER: 'azure', AZURE_API_KEY: 'test-key' }))).toThrow(
      ConfigError
    );
  });

  it('builds an Azure provider named after the embedding deployment', () => {
    const provider = createEmbeddingProvider(
      loadConfig({
        SARA_PROVIDER: 'azure',
        AZURE_API_KEY: 'test-key',
        AZURE_API_ENDPOINT: 'https://example.openai.azure.com/',
        AZURE_EMBEDDING_DEPLOYMENT: 'embed-large',
      })
    );
    expect(provider).toBeInstanceOf(AzureEmbeddingProvider);
    expect(provider.model).toBe('embed-large');
  });

  it('builds an OpenAI provider with the configured model', () => {
    const provider = createEmbeddingProvider(
      loadConfig({ OPENAI_API_KEY: 'test-key', EMBEDDING_MODEL: 'text-embedding-3-large' })
    );
    expect(provider).toBeInstanceOf(OpenAIEmbeddingProvider);
    expect(provider.model).toBe('text-embedding-3-large');
  });
});
