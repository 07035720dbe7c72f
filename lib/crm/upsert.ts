import type { FieldValues, RecordKind } from '@/types';
import { logger } from '@/lib/logger';
import { ValidationError } from './errors';
import { CrmRecord } from './record';
import { getRecordSchema, isBlank } from './schema';
import type { RecordStore } from './store';

export type FieldsFactory<K extends RecordKind> = (
  key: string,
  existing: CrmRecord<K> | null,
) => FieldValues<K>;

export type RecordUpsertHelper<K extends RecordKind> = {
  kind: K;
  findOrCreate(
    naturalKeyValue: string,
    defaultFields: FieldValues<K>,
    updateFields?: FieldValues<K>,
  ): Promise<CrmRecord<K>>;
  batchUpsertByName(
    naturalKeyValues: readonly string[],
    fieldsFactory: FieldsFactory<K>,
  ): Promise<CrmRecord<K>[]>;
  deleteAll(records: readonly CrmRecord<K>[]): Promise<void>;
};

function assertNaturalKey(kind: RecordKind, field: string, value: string): void {
  if (isBlank(value)) {
    throw new ValidationError(`${kind}.${field} lookup value must not be blank`);
  }
}

// 更新用フィールドで自然キーが書き換わらないようにする
function keepNaturalKey<K extends RecordKind>(record: CrmRecord<K>, key: string): CrmRecord<K> {
  if (record.naturalKeyValue() !== key) {
    record.setNaturalKeyValue(key);
  }
  return record;
}

/**
 * 自然キー（name など）で既存レコードを探し、あれば更新・なければ作成するヘルパー。
 * 重複キーがある場合はストアが最初に返した 1 件を使う（順序は保証しない）。
 */
export function createRecordUpsertHelper<K extends RecordKind>(
  store: RecordStore,
  kind: K,
): RecordUpsertHelper<K> {
  const { naturalKey } = getRecordSchema(kind);

  async function findOrCreate(
    naturalKeyValue: string,
    defaultFields: FieldValues<K>,
    updateFields: FieldValues<K> = {},
  ): Promise<CrmRecord<K>> {
    assertNaturalKey(kind, naturalKey, naturalKeyValue);

    const existing = await store.query(kind, [{ field: naturalKey, value: naturalKeyValue }]);
    if (existing.length === 0) {
      const record = new CrmRecord(kind, defaultFields).setNaturalKeyValue(naturalKeyValue);
      const [created] = await store.write([record], 'create');
      logger.info('[upsert] created', { kind, key: naturalKeyValue, id: created.id });
      return created;
    }

    if (existing.length > 1) {
      logger.warn('[upsert] duplicate natural key; using first match', {
        kind,
        key: naturalKeyValue,
        matches: existing.map((record) => record.id),
      });
    }
    const [record] = existing;
    keepNaturalKey(record.assign(updateFields), naturalKeyValue);
    const [updated] = await store.write([record], 'update');
    logger.info('[upsert] updated', { kind, key: naturalKeyValue, id: updated.id });
    return updated;
  }

  async function batchUpsertByName(
    naturalKeyValues: readonly string[],
    fieldsFactory: FieldsFactory<K>,
  ): Promise<CrmRecord<K>[]> {
    for (const value of naturalKeyValues) {
      assertNaturalKey(kind, naturalKey, value);
    }
    if (naturalKeyValues.length === 0) {
      return [];
    }

    const keys = Array.from(new Set(naturalKeyValues));
    const existing = await store.query(kind, [{ field: naturalKey, value: keys }]);
    const lookup = new Map<string, CrmRecord<K>>();
    for (const record of existing) {
      const key = record.naturalKeyValue();
      if (key !== null && !lookup.has(key)) {
        lookup.set(key, record);
      }
    }

    const resolved = new Map<string, CrmRecord<K>>();
    let created = 0;
    for (const key of keys) {
      const found = lookup.get(key) ?? null;
      const fields = fieldsFactory(key, found);
      if (found) {
        resolved.set(key, keepNaturalKey(found.assign(fields), key));
        continue;
      }
      const record = new CrmRecord(kind, fields).setNaturalKeyValue(key);
      resolved.set(key, record);
      created += 1;
    }

    await store.write(Array.from(resolved.values()), 'upsert');
    logger.info('[upsert] batch written', {
      kind,
      requested: naturalKeyValues.length,
      created,
      updated: resolved.size - created,
    });

    const results: CrmRecord<K>[] = [];
    for (const key of naturalKeyValues) {
      const record = resolved.get(key);
      if (record) {
        results.push(record);
      }
    }
    return results;
  }

  async function deleteAll(records: readonly CrmRecord<K>[]): Promise<void> {
    if (records.length === 0) {
      return;
    }
    await store.delete(records);
    logger.info('[upsert] deleted', { kind, count: records.length });
  }

  return { kind, findOrCreate, batchUpsertByName, deleteAll };
}
