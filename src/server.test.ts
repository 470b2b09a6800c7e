import type { Server } from 'http';
import type { Express } from 'express';
import * as path from 'path';
import { CorruptIndexError, IndexNotFoundError, InvalidQueryError, ProviderError } from './errors.js';
import { setLogLevel } from './logger.js';
import { buildIndex } from './retrieval/builder.js';
import { saveIndex } from './retrieval/persistence.js';
import { createApp, startServer, statusForError, type ServerDeps } from './server.js';
import { KeywordEmbeddingProvider, ScriptedChatClient, makeRecord, makeTempDir, removeTempDirs } from './test-utils.js';

afterAll(removeTempDirs);

setLogLevel('silent');

async function listen(app: Express): Promise<{ server: Server; baseUrl: string }> {
  const server = await startServer(app, 0);
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Expected a TCP address');
  }
  return { server, baseUrl: `http://127.0.0.1:${address.port}` };
}

function close(server: Server): Promise<void> {
  return new Promise<void>((resolve, reject) => server.close(error => (error ? reject(error) : resolve())));
}

describe('statusForError', () => {
  it('maps error codes to HTTP statuses', () => {
    expect(statusForError(new InvalidQueryError('blank'))).toBe(400);
    expect(statusForError(new IndexNotFoundError('x'))).toBe(404);
    expect(statusForError(new ProviderError('down', 503))).toBe(502);
    expect(statusForError(new CorruptIndexError('bad'))).toBe(500);
    expect(statusForError(new Error('boom'))).toBe(500);
  });
});

describe('HTTP API', () => {
  let server: Server;
  let baseUrl: string;
  let deps: ServerDeps;

  beforeAll(async () => {
    const dir = await makeTempDir();
    const embeddings = new KeywordEmbeddingProvider(['nlp', 'optics']);
    const indexPath = path.join(dir, 'researchers.index');
    await saveIndex(
      await buildIndex(
        [
          makeRecord({ name: 'Alice', research_areas: ['NLP'], source: 'https://example.org/alice' }),
          makeRecord({ name: 'Bob', research_areas: ['optics'] }),
        ],
        embeddings
      ),
      indexPath
    );

    deps = {
      embeddings,
      chat: new ScriptedChatClient(() => 'Alice works on NLP.'),
      indexPath,
      topK: 1,
      maxContextChars: 8000,
      currency: 'PLN',
    };

    ({ server, baseUrl } = await listen(createApp(deps)));
  });

  afterAll(async () => {
    await close(server);
  });

  function post(route: string, body: string): Promise<Response> {
    return fetch(`${baseUrl}${route}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body,
    });
  }

  it('reports health', async () => {
    const res = await fetch(`${baseUrl}/api/health`);
    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ status: 'ok' });
  });

  it('searches with the default topK', async () => {
    const res = await post('/api/search', JSON.stringify({ query: 'optics' }));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      results: [{ record: makeRecord({ name: 'Bob', research_areas: ['optics'] }), distance: 0 }],
    });
  });

  it('honours topK in the body', async () => {
    const res = await post('/api/search', JSON.stringify({ query: 'optics', topK: 5 }));

    expect(await res.json()).toEqual({
      results: [
        { record: makeRecord({ name: 'Bob', research_areas: ['optics'] }), distance: 0 },
        {
          record: makeRecord({ name: 'Alice', research_areas: ['NLP'], source: 'https://example.org/alice' }),
          distance: 2,
        },
      ],
    });
  });

  it('answers with sources', async () => {
    const res = await post('/api/ask', JSON.stringify({ question: 'Who works on NLP?' }));

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ answer: 'Alice works on NLP.', sources: ['https://example.org/alice'] });
  });

  it('rejects a blank query with 400', async () => {
    const res = await post('/api/search', JSON.stringify({ query: '  ' }));

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({ error: 'Query must not be empty', code: 'INVALID_QUERY' });
  });

  it('rejects a malformed body with 400', async () => {
    const missing = await post('/api/ask', JSON.stringify({ topK: 2 }));
    expect(missing.status).toBe(400);

    const broken = await post('/api/search', '{"query": ');
    expect(broken.status).toBe(400);
    expect(await broken.json()).toEqual({ error: 'Malformed JSON body', code: 'INVALID_QUERY' });
  });

  it('returns 404 when the index is missing', async () => {
    const dir = await makeTempDir();
    const other = await listen(createApp({ ...deps, indexPath: path.join(dir, 'never-built.index') }));

    try {
      const res = await fetch(`${other.baseUrl}/api/search`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ query: 'NLP' }),
      });
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: `Index file not found: ${path.join(dir, 'never-built.index')}`,
        code: 'INDEX_NOT_FOUND',
      });
    } finally {
      await close(other.server);
    }
  });

  it('rejects when the port is already taken', async () => {
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Expected a TCP address');
    }

    await expect(startServer(createApp(deps), address.port)).rejects.toMatchObject({ code: 'EADDRINUSE' });
  });
});
