import type { FieldValue, RecordKind, ScalarValue } from '@/types';
import { logger } from '@/lib/logger';
import { NotFoundError, ValidationError } from './errors';
import { CrmRecord, type RecordFields } from './record';
import { getFieldSpec } from './schema';
import {
  planDelete,
  planWrite,
  type FieldCondition,
  type RecordStore,
  type WriteMode,
} from './store';

export type StoreCall =
  | { op: 'query' | 'retrieve'; kind: RecordKind }
  | { op: 'write'; kind: RecordKind | null; mode: WriteMode; size: number }
  | { op: 'delete'; size: number };

function toList(value: ScalarValue | readonly ScalarValue[]): readonly ScalarValue[] {
  return typeof value === 'object' ? value : [value];
}

function matches(
  fields: RecordFields,
  field: string,
  expected: readonly ScalarValue[],
): boolean {
  const actual: FieldValue | undefined = fields[field];
  if (actual === undefined) {
    return false;
  }
  if (typeof actual === 'object') {
    return expected.some((value) => typeof value === 'string' && actual.includes(value));
  }
  return expected.includes(actual);
}

/**
 * In-process RecordStore with the same contract as the Airtable one.
 * Rows live per kind in insertion order; every call is appended to `calls`.
 */
export class MemoryRecordStore implements RecordStore {
  readonly calls: StoreCall[] = [];
  private readonly tables = new Map<RecordKind, Map<string, RecordFields>>();
  private sequence = 0;

  async query<K extends RecordKind>(
    kind: K,
    conditions: readonly FieldCondition<K>[] = [],
  ): Promise<CrmRecord<K>[]> {
    this.calls.push({ op: 'query', kind });
    const rows: CrmRecord<K>[] = [];
    for (const [id, fields] of this.table(kind)) {
      const hit = conditions.every((condition) =>
        matches(fields, condition.field, toList(condition.value)),
      );
      if (hit) {
        rows.push(CrmRecord.hydrate(kind, id, fields));
      }
    }
    logger.debug('[memoryStore] query', { kind, conditions, hits: rows.length });
    return rows;
  }

  async retrieve<K extends RecordKind>(kind: K, ids: readonly string[]): Promise<CrmRecord<K>[]> {
    this.calls.push({ op: 'retrieve', kind });
    const table = this.table(kind);
    const rows: CrmRecord<K>[] = [];
    for (const id of new Set(ids)) {
      const fields = table.get(id);
      if (fields) {
        rows.push(CrmRecord.hydrate(kind, id, fields));
      }
    }
    return rows;
  }

  async write<K extends RecordKind>(
    records: readonly CrmRecord<K>[],
    mode: WriteMode,
  ): Promise<CrmRecord<K>[]> {
    const plan = planWrite(records, mode);
    this.calls.push({ op: 'write', kind: plan.kind, mode, size: records.length });
    if (plan.kind === null) {
      return [];
    }

    const table = this.table(plan.kind);
    const missing: string[] = [];
    for (const record of plan.updates) {
      if (record.id !== null && !table.has(record.id)) {
        missing.push(record.id);
      }
    }
    if (missing.length > 0) {
      throw new NotFoundError(`${plan.kind} not found: ${missing.join(', ')}`, missing);
    }
    for (const record of plan.creates) {
      this.assertLinks(record.kind, record.toFields());
    }
    for (const record of plan.updates) {
      this.assertLinks(record.kind, record.changedFields());
    }

    // ここから先は失敗しない（バッチ単位で全件反映）
    for (const record of plan.creates) {
      const id = this.nextId();
      table.set(id, record.toFields());
      record.markPersisted(id);
    }
    for (const record of plan.updates) {
      const id = record.id;
      if (id === null) continue;
      table.set(id, { ...table.get(id), ...record.changedFields() });
      record.markPersisted(id);
    }

    logger.debug('[memoryStore] write', {
      kind: plan.kind,
      mode,
      created: plan.creates.length,
      updated: plan.updates.length,
    });
    return [...records];
  }

  async delete(records: readonly CrmRecord[]): Promise<void> {
    const byKind = planDelete(records);
    this.calls.push({ op: 'delete', size: records.length });

    const missing: string[] = [];
    for (const [kind, ids] of byKind) {
      const table = this.table(kind);
      missing.push(...ids.filter((id) => !table.has(id)));
    }
    if (missing.length > 0) {
      throw new NotFoundError(`Records not found: ${missing.join(', ')}`, missing);
    }

    const removed = new Set<string>();
    for (const [kind, ids] of byKind) {
      const table = this.table(kind);
      for (const id of ids) {
        table.delete(id);
        removed.add(id);
      }
    }
    this.unlink(removed);
    for (const record of records) {
      record.markDeleted();
    }
    logger.debug('[memoryStore] delete', { deleted: removed.size });
  }

  /** Number of rows currently held for a kind. */
  count(kind: RecordKind): number {
    return this.table(kind).size;
  }

  private table(kind: RecordKind): Map<string, RecordFields> {
    let table = this.tables.get(kind);
    if (!table) {
      table = new Map();
      this.tables.set(kind, table);
    }
    return table;
  }

  private nextId(): string {
    this.sequence += 1;
    return `rec${this.sequence.toString(36).padStart(14, '0')}`;
  }

  private assertLinks(kind: RecordKind, fields: RecordFields): void {
    for (const [field, value] of Object.entries(fields)) {
      const spec = getFieldSpec(kind, field);
      if (spec?.type !== 'link' || typeof value !== 'object') {
        continue;
      }
      const target = this.table(spec.to);
      const broken = value.filter((id) => !target.has(id));
      if (broken.length > 0) {
        throw new ValidationError(
          `${kind}.${field} links to unknown ${spec.to} record(s): ${broken.join(', ')}`,
        );
      }
    }
  }

  // 削除されたレコードへのリンクは他テーブルから外す
  private unlink(removed: ReadonlySet<string>): void {
    for (const table of this.tables.values()) {
      for (const [id, fields] of table) {
        let touched = false;
        const next: RecordFields = {};
        for (const [field, value] of Object.entries(fields)) {
          if (typeof value === 'object' && value.some((linked) => removed.has(linked))) {
            next[field] = value.filter((linked) => !removed.has(linked));
            touched = true;
          } else {
            next[field] = value;
          }
        }
        if (touched) {
          table.set(id, next);
        }
      }
    }
  }
}
