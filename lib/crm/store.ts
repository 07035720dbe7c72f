import type { FieldName, RecordKind, ScalarValue } from '@/types';
import { NotFoundError, StaleReferenceError, ValidationError } from './errors';
import type { CrmRecord } from './record';
import { assertCreatable } from './schema';

export type WriteMode = 'create' | 'update' | 'upsert';

/** Equality on one field; a list means "any of". Link fields match when they contain the ID. */
export type FieldCondition<K extends RecordKind> = {
  field: FieldName<K>;
  value: ScalarValue | readonly ScalarValue[];
};

/**
 * The persistence collaborator every helper and lesson receives explicitly.
 * Writes mutate the passed records in place and resolve to the same instances.
 */
export interface RecordStore {
  query<K extends RecordKind>(
    kind: K,
    conditions?: readonly FieldCondition<K>[],
  ): Promise<CrmRecord<K>[]>;
  retrieve<K extends RecordKind>(kind: K, ids: readonly string[]): Promise<CrmRecord<K>[]>;
  write<K extends RecordKind>(
    records: readonly CrmRecord<K>[],
    mode: WriteMode,
  ): Promise<CrmRecord<K>[]>;
  delete(records: readonly CrmRecord[]): Promise<void>;
}

export type WritePlan<K extends RecordKind> = {
  kind: K | null;
  creates: CrmRecord<K>[];
  updates: CrmRecord<K>[];
};

/**
 * 書き込み前の共通チェック。1件でも不正ならバッチ全体を拒否する。
 */
export function planWrite<K extends RecordKind>(
  records: readonly CrmRecord<K>[],
  mode: WriteMode,
): WritePlan<K> {
  const plan: WritePlan<K> = { kind: null, creates: [], updates: [] };
  const seen = new Set<CrmRecord<K>>();

  for (const record of records) {
    if (seen.has(record)) {
      continue;
    }
    seen.add(record);

    if (plan.kind === null) {
      plan.kind = record.kind;
    } else if (plan.kind !== record.kind) {
      throw new ValidationError(
        `A write batch holds one record kind (got ${plan.kind} and ${record.kind})`,
      );
    }

    if (record.state === 'deleted') {
      throw new StaleReferenceError(record.id);
    }

    if (record.id === null) {
      if (mode === 'update') {
        throw new NotFoundError(`${record.kind} has not been created yet; cannot update`);
      }
      assertCreatable(record.kind, record.fieldMap());
      plan.creates.push(record);
      continue;
    }

    if (mode === 'create') {
      throw new ValidationError(
        `${record.kind} ${record.id} already exists; use update or upsert`,
      );
    }
    plan.updates.push(record);
  }

  return plan;
}

/** Groups a delete batch by kind after checking every record is still live. */
export function planDelete(records: readonly CrmRecord[]): Map<RecordKind, string[]> {
  const byKind = new Map<RecordKind, string[]>();
  const seen = new Set<string>();

  for (const record of records) {
    const { id } = record;
    if (id === null || record.state !== 'persistent') {
      throw new NotFoundError(
        `${record.kind} ${id ?? '(unsaved)'} is not a persisted record`,
        id === null ? [] : [id],
      );
    }
    if (seen.has(id)) {
      continue;
    }
    seen.add(id);
    const ids = byKind.get(record.kind) ?? [];
    ids.push(id);
    byKind.set(record.kind, ids);
  }

  return byKind;
}
