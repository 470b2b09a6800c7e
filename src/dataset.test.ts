import * as fs from 'fs/promises';
import * as path from 'path';
import { loadRecords, parseRecords } from './dataset.js';
import { DatasetNotFoundError, InvalidDatasetError } from './errors.js';
import { makeTempDir, removeTempDirs } from './test-utils.js';

afterAll(removeTempDirs);

describe('parseRecords', () => {
  it('fills missing fields with empty values', () => {
    const records = parseRecords([{ name: 'Alice', research_areas: ['NLP'], extra: 'dropped' }], 'inline');

    expect(records).toEqual([
      { name: 'Alice', affiliation: '', research_areas: ['NLP'], projects: [], source: '' },
    ]);
  });

  it('normalizes project years and grant amounts', () => {
    const [record] = parseRecords(
      [
        {
          name: 'Bob',
          projects: [
            { title: 'A', years: 2021, grant_amount: 1000 },
            { title: 'B', years: null },
          ],
        },
      ],
      'inline'
    );

    expect(record.projects).toEqual([
      { title: 'A', years: '2021', grant_amount: 1000 },
      { title: 'B', years: '', grant_amount: null },
    ]);
  });

  it('reports the offending element', () => {
    expect(() => parseRecords([{ name: 'ok' }, { name: 42 }], 'data.json')).toThrow(
      /Invalid records in data\.json at 1\.name/
    );
  });

  it('rejects a non-array root', () => {
    expect(() => parseRecords({ name: 'Alice' }, 'data.json')).toThrow(InvalidDatasetError);
  });
});

describe('loadRecords', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  it('reads a UTF-8 JSON array', async () => {
    const file = path.join(dir, 'researchers.json');
    await fs.writeFile(file, JSON.stringify([{ name: 'Łucja Żak', affiliation: 'UAM' }]), 'utf-8');

    const records = await loadRecords(file);

    expect(records).toHaveLength(1);
    expect(records[0].name).toBe('Łucja Żak');
  });

  it('throws DatasetNotFoundError for a missing file', async () => {
    await expect(loadRecords(path.join(dir, 'nope.json'))).rejects.toBeInstanceOf(DatasetNotFoundError);
  });

  it('throws DatasetNotFoundError when a parent path is a file', async () => {
    const blocker = path.join(dir, 'plain.txt');
    await fs.writeFile(blocker, 'not a directory', 'utf-8');

    await expect(loadRecords(path.join(blocker, 'researchers.json'))).rejects.toBeInstanceOf(DatasetNotFoundError);
  });

  it('throws InvalidDatasetError for broken JSON', async () => {
    const file = path.join(dir, 'broken.json');
    await fs.writeFile(file, '[{"name": ', 'utf-8');

    await expect(loadRecords(file)).rejects.toBeInstanceOf(InvalidDatasetError);
  });
});
