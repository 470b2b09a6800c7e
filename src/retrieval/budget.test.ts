import { makeRecord } from '../test-utils.js';
import type { EntityRecord } from '../types.js';
import { selectWithinBudget } from './budget.js';

// Ranked by relevance; the block is just the name, so its length is known
const records: EntityRecord[] = [
  makeRecord({ name: 'a'.repeat(100) }),
  makeRecord({ name: 'b'.repeat(80) }),
  makeRecord({ name: 'c'.repeat(500) }),
  makeRecord({ name: 'd'.repeat(10) }),
];
const byName = (record: EntityRecord) => record.name;

describe('selectWithinBudget', () => {
  it('skips a record that does not fit and keeps trying smaller ones', () => {
    const result = selectWithinBudget(records, 200, byName);

    expect(result.selected.map(r => r.name.length)).toEqual([100, 80, 10]);
    // 100 + 2 + 80 + 2 + 10
    expect(result.totalChars).toBe(194);
    expect(result.context.length).toBe(194);
  });

  it('counts separators against the budget', () => {
    const pair = records.slice(0, 2);

    expect(selectWithinBudget(pair, 182, byName).selected).toHaveLength(2);
    const result = selectWithinBudget(pair, 181, byName);
    expect(result.selected.map(r => r.name.length)).toEqual([100]);
    expect(result.totalChars).toBe(100);
  });

  it('selects nothing when every block is too large', () => {
    const result = selectWithinBudget(records, 5, byName);

    expect(result.selected).toEqual([]);
    expect(result.context).toBe('');
    expect(result.totalChars).toBe(0);
  });

  it('keeps rank order and joins blocks with a blank line', () => {
    const result = selectWithinBudget(
      [makeRecord({ name: 'first' }), makeRecord({ name: 'second' })],
      1000,
      byName
    );

    expect(result.context).toBe('first\n\nsecond');
  });
});
