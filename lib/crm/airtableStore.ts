import type { RecordKind } from '@/types';
import {
  AIRTABLE_BATCH_SIZE,
  chunkArray,
  getTableGateway,
  type StoredRow,
  type TableGateway,
} from '@/lib/airtable';
import { logger } from '@/lib/logger';
import {
  BackingStoreError,
  isCrmError,
  NotFoundError,
  ValidationError,
  type CrmError,
} from './errors';
import { buildConditionFormula, buildRecordIdFormula, splitLinkConditions } from './formula';
import { CrmRecord } from './record';
import { getRecordSchema, validateFieldValue } from './schema';
import {
  planDelete,
  planWrite,
  type FieldCondition,
  type RecordStore,
  type WriteMode,
} from './store';

export type TableResolver = (tableName: string) => TableGateway;

// API はリンクセルをレコード ID の配列で返す
function hasLink<K extends RecordKind>(
  record: CrmRecord<K>,
  condition: FieldCondition<K>,
): boolean {
  const wanted = typeof condition.value === 'object' ? condition.value : [condition.value];
  const links = record.getLinks(condition.field);
  return wanted.some((id) => typeof id === 'string' && links.includes(id));
}

function readStatus(error: unknown): number | null {
  if (typeof error === 'object' && error !== null && 'statusCode' in error) {
    return typeof error.statusCode === 'number' ? error.statusCode : null;
  }
  return null;
}

function readMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

/** Maps an SDK failure onto the record error kinds. */
export function toCrmError(error: unknown): CrmError {
  if (isCrmError(error)) {
    return error;
  }
  const status = readStatus(error);
  const message = readMessage(error);
  if (status === 404) {
    return new NotFoundError(message);
  }
  if (status === 422) {
    return new ValidationError(message);
  }
  return new BackingStoreError(message || 'Airtable request failed', status, error);
}

/**
 * RecordStore backed by one Airtable table per record kind.
 * Batches larger than the API limit are sent as several requests.
 */
export class AirtableRecordStore implements RecordStore {
  constructor(private readonly resolveTable: TableResolver = getTableGateway) {}

  async query<K extends RecordKind>(
    kind: K,
    conditions: readonly FieldCondition<K>[] = [],
  ): Promise<CrmRecord<K>[]> {
    const { columns, links } = splitLinkConditions(kind, conditions);
    const formula = buildConditionFormula(kind, columns);
    const rows = await this.request('select', kind, (table) => table.select(formula));
    const records = rows
      .map((row) => this.hydrate(kind, row))
      .filter((record) => links.every((condition) => hasLink(record, condition)));
    logger.debug('[airtableStore] query', {
      kind,
      formula,
      links: links.length,
      rows: rows.length,
      hits: records.length,
    });
    return records;
  }

  async retrieve<K extends RecordKind>(kind: K, ids: readonly string[]): Promise<CrmRecord<K>[]> {
    const records: CrmRecord<K>[] = [];
    for (const chunk of chunkArray(Array.from(new Set(ids)), AIRTABLE_BATCH_SIZE)) {
      const rows = await this.request('select', kind, (table) =>
        table.select(buildRecordIdFormula(chunk)),
      );
      records.push(...rows.map((row) => this.hydrate(kind, row)));
    }
    return records;
  }

  async write<K extends RecordKind>(
    records: readonly CrmRecord<K>[],
    mode: WriteMode,
  ): Promise<CrmRecord<K>[]> {
    const { kind, creates, updates } = planWrite(records, mode);
    if (kind === null) {
      return [];
    }

    if (creates.length > 0) {
      const rows = await this.request('create', kind, (table) =>
        table.create(creates.map((record) => record.toFields())),
      );
      this.assignIds(kind, creates, rows);
    }
    if (updates.length > 0) {
      const rows = await this.request('update', kind, (table) =>
        table.update(
          updates.flatMap((record) =>
            record.id === null ? [] : [{ id: record.id, fields: record.changedFields() }],
          ),
        ),
      );
      this.assignIds(kind, updates, rows);
    }

    logger.debug('[airtableStore] write', {
      kind,
      mode,
      created: creates.length,
      updated: updates.length,
    });
    return [...records];
  }

  async delete(records: readonly CrmRecord[]): Promise<void> {
    const byKind = planDelete(records);
    for (const [kind, ids] of byKind) {
      await this.request('destroy', kind, (table) => table.destroy(ids));
      // destroy に成功した種別から削除済みにする
      for (const record of records) {
        if (record.kind === kind) {
          record.markDeleted();
        }
      }
    }
    logger.debug('[airtableStore] delete', { count: records.length });
  }

  private async request<T>(
    operation: string,
    kind: RecordKind,
    call: (table: TableGateway) => Promise<T>,
  ): Promise<T> {
    const { table } = getRecordSchema(kind);
    try {
      return await call(this.resolveTable(table));
    } catch (error) {
      const mapped = toCrmError(error);
      logger.error(`[airtableStore] ${operation} ${table} failed`, mapped);
      throw mapped;
    }
  }

  private assignIds<K extends RecordKind>(
    kind: K,
    records: readonly CrmRecord<K>[],
    rows: readonly StoredRow[],
  ): void {
    if (rows.length !== records.length) {
      throw new BackingStoreError(
        `${kind} write returned ${rows.length} rows for ${records.length} records`,
      );
    }
    records.forEach((record, index) => record.markPersisted(rows[index].id));
  }

  // スキーマ外のカラムや添付・コラボレーター型の値は読み捨てる
  private hydrate<K extends RecordKind>(kind: K, row: StoredRow): CrmRecord<K> {
    const fields: Record<string, unknown> = {};
    const dropped: string[] = [];
    for (const [field, value] of Object.entries(row.fields)) {
      const checked = validateFieldValue(kind, field, value);
      if (checked.success) {
        fields[field] = checked.value;
      } else {
        dropped.push(field);
      }
    }
    if (dropped.length > 0) {
      logger.debug('[airtableStore] ignored columns', { kind, id: row.id, dropped });
    }
    return CrmRecord.hydrate(kind, row.id, fields);
  }
}
