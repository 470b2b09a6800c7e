import * as path from 'path';
import { askWithContext, buildPrompt, formatRecordContext } from './answer.js';
import { InvalidQueryError } from './errors.js';
import { setLogLevel } from './logger.js';
import { buildIndex } from './retrieval/builder.js';
import { saveIndex } from './retrieval/persistence.js';
import { KeywordEmbeddingProvider, ScriptedChatClient, makeRecord, makeTempDir, removeTempDirs } from './test-utils.js';

afterAll(removeTempDirs);

setLogLevel('silent');

describe('formatRecordContext', () => {
  it('renders name, affiliation, areas, projects and source', () => {
    const block = formatRecordContext(
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

    expect(block).toBe(
      [
        'Alice Nowak (WMiI UAM): fuzzy logic, NLP',
        '- Fuzzy reasoning (2019-2022) | 150000 PLN',
        '- Corpus tools',
        'Source: https://example.org/alice',
      ].join('\n')
    );
  });

  it('drops the parenthesis without an affiliation', () => {
    expect(formatRecordContext(makeRecord({ name: 'Bob', research_areas: ['optics'] }), 'EUR')).toBe('Bob: optics');
  });
});

describe('buildPrompt', () => {
  it('puts context before the question', () => {
    expect(buildPrompt('ctx', 'Who?')).toBe('CONTEXT:\nctx\n\nQUESTION:\nWho?\n\nANSWER:');
  });
});

describe('askWithContext', () => {
  const embeddings = new KeywordEmbeddingProvider(['nlp', 'optics']);
  let indexPath: string;

  beforeAll(async () => {
    indexPath = path.join(await makeTempDir(), 'researchers.index');
    const records = [
      makeRecord({ name: 'Alice', research_areas: ['NLP'], source: 'https://example.org/alice' }),
      makeRecord({ name: 'Bob', research_areas: ['optics'] }),
    ];
    await saveIndex(await buildIndex(records, embeddings), indexPath);
  });

  it('sends retrieved context and the trimmed question to the chat model', async () => {
    const chat = new ScriptedChatClient(() => 'Alice works on NLP.');

    const result = await askWithContext('  Who works on NLP?  ', { embeddings, chat, indexPath }, {
      topK: 1,
      maxContextChars: 8000,
    });

    expect(result.answer).toBe('Alice works on NLP.');
    expect(result.records.map(r => r.name)).toEqual(['Alice']);
    expect(result.context).toBe('Alice: NLP\nSource: https://example.org/alice');
    expect(chat.requests).toHaveLength(1);
    expect(chat.requests[0].messages).toEqual([
      { role: 'user', content: buildPrompt(result.context, 'Who works on NLP?') },
    ]);
    expect(chat.requests[0].options).toEqual({ temperature: 0.3 });
  });

  it('drops records that exceed the context budget', async () => {
    const chat = new ScriptedChatClient(() => 'No data.');

    const result = await askWithContext('NLP', { embeddings, chat, indexPath }, { topK: 2, maxContextChars: 5 });

    expect(result.records).toEqual([]);
    expect(result.context).toBe('');
  });

  it('rejects a blank question without calling the model', async () => {
    const chat = new ScriptedChatClient(() => 'unused');

    await expect(
      askWithContext(' ', { embeddings, chat, indexPath }, { topK: 1, maxContextChars: 100 })
    ).rejects.toBeInstanceOf(InvalidQueryError);
    expect(chat.requests).toHaveLength(0);
  });
});
