// ============================================================================
// FILE: src/retrieval/budget.ts
// PURPOSE: Select retrieved records within a character budget for LLM context
// ============================================================================

import type { EntityRecord } from '../types.js';

/**
 * BudgetResult - Result of budget-constrained record selection
 */
export interface BudgetResult {
  selected: EntityRecord[];
  totalChars: number;
  context: string;
}

const SEPARATOR = '\n\n';

/**
 * selectWithinBudget - Greedy selection of records within a character budget
 *
 * Iterates through ranked records and adds each that fits.
 * Continues trying smaller records even if one doesn't fit.
 * Separators between blocks count against the budget.
 *
 * @param records - Records ranked by relevance (most relevant first)
 * @param maxChars - Maximum context length in characters
 * @param format - Renders one record as a context block
 */
export function selectWithinBudget(
  records: EntityRecord[],
  maxChars: number,
  format: (record: EntityRecord) => string
): BudgetResult {
  const selected: EntityRecord[] = [];
  const blocks: string[] = [];
  let totalChars = 0;

  for (const record of records) {
    const block = format(record);
    const cost = block.length + (blocks.length > 0 ? SEPARATOR.length : 0);
    if (totalChars + cost <= maxChars) {
      selected.push(record);
      blocks.push(block);
      totalChars += cost;
    }
  }

  return { selected, totalChars, context: blocks.join(SEPARATOR) };
}
