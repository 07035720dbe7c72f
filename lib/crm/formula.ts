import type { RecordKind, ScalarValue } from '@/types';
import { ValidationError } from './errors';
import { getFieldSpec } from './schema';
import type { FieldCondition } from './store';

// Airtable 式の文字列リテラル用エスケープ
export function escapeFormulaValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

function literal(value: ScalarValue): string {
  if (typeof value === 'string') {
    return `'${escapeFormulaValue(value)}'`;
  }
  if (typeof value === 'boolean') {
    return value ? 'TRUE()' : 'FALSE()';
  }
  return String(value);
}

function joinClauses(operator: 'AND' | 'OR', clauses: string[]): string {
  if (clauses.length === 1) {
    return clauses[0];
  }
  return `${operator}(${clauses.join(',')})`;
}

function isLinkCondition<K extends RecordKind>(kind: K, condition: FieldCondition<K>): boolean {
  return getFieldSpec(kind, condition.field)?.type === 'link';
}

export type SplitConditions<K extends RecordKind> = {
  columns: FieldCondition<K>[];
  links: FieldCondition<K>[];
};

/**
 * リンクフィールドは式の中ではプライマリフィールドの値に展開されるため、
 * レコード ID での絞り込みは取得後に行う。
 */
export function splitLinkConditions<K extends RecordKind>(
  kind: K,
  conditions: readonly FieldCondition<K>[],
): SplitConditions<K> {
  const split: SplitConditions<K> = { columns: [], links: [] };
  for (const condition of conditions) {
    (isLinkCondition(kind, condition) ? split.links : split.columns).push(condition);
  }
  return split;
}

/**
 * Turns conditions on plain columns into one filterByFormula expression.
 * Returns `undefined` when there is nothing to filter on.
 */
export function buildConditionFormula<K extends RecordKind>(
  kind: K,
  conditions: readonly FieldCondition<K>[],
): string | undefined {
  const clauses: string[] = [];
  for (const condition of conditions) {
    const { field, value } = condition;
    if (isLinkCondition(kind, condition)) {
      throw new ValidationError(
        `${kind}.${field} is a link field and cannot be used in a formula`,
      );
    }
    const values = typeof value === 'object' ? value : [value];
    if (values.length === 0) {
      // 空の IN 条件は常に偽
      clauses.push('FALSE()');
      continue;
    }
    clauses.push(joinClauses('OR', values.map((item) => `({${field}}=${literal(item)})`)));
  }
  if (clauses.length === 0) {
    return undefined;
  }
  return joinClauses('AND', clauses);
}

export function buildRecordIdFormula(ids: readonly string[]): string {
  return joinClauses(
    'OR',
    ids.map((id) => `RECORD_ID()=${literal(id)}`),
  );
}
