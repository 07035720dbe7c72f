import Airtable, { type FieldSet, type Table } from 'airtable';
import { logger } from './logger';

// Airtable API は 1 リクエストあたり 10 件まで
export const AIRTABLE_BATCH_SIZE = 10;

export type StoredRow = {
  id: string;
  fields: Readonly<Record<string, unknown>>;
};

/** The four table calls the record store needs, already split into API-sized batches. */
export interface TableGateway {
  select(filterByFormula?: string): Promise<StoredRow[]>;
  create(rows: readonly FieldSet[]): Promise<StoredRow[]>;
  update(rows: readonly { id: string; fields: FieldSet }[]): Promise<StoredRow[]>;
  destroy(ids: readonly string[]): Promise<string[]>;
}

type AirtableBase = ReturnType<Airtable['base']>;

let cachedBase: AirtableBase | null = null;

export function getBase(): AirtableBase {
  if (cachedBase) {
    return cachedBase;
  }
  const apiKey = process.env.AIRTABLE_API_KEY;
  const baseId = process.env.AIRTABLE_BASE_ID;
  if (!apiKey || !baseId) {
    throw new Error(
      [
        'Airtable env missing.',
        `AIRTABLE_API_KEY=${apiKey ? '[set]' : '[missing]'}`,
        `AIRTABLE_BASE_ID=${baseId ? '[set]' : '[missing]'}`,
      ].join(' '),
    );
  }
  cachedBase = new Airtable({ apiKey }).base(baseId);
  return cachedBase;
}

export function chunkArray<T>(values: readonly T[], size: number): T[][] {
  if (size <= 0) {
    return [[...values]];
  }
  const chunks: T[][] = [];
  for (let index = 0; index < values.length; index += size) {
    chunks.push(values.slice(index, index + size));
  }
  return chunks;
}

function toRow(record: { id: string; fields: FieldSet }): StoredRow {
  return { id: record.id, fields: record.fields };
}

export function createTableGateway(table: Table<FieldSet>): TableGateway {
  return {
    async select(filterByFormula) {
      const records = await table.select(filterByFormula ? { filterByFormula } : {}).all();
      return records.map(toRow);
    },
    async create(rows) {
      const created: StoredRow[] = [];
      for (const chunk of chunkArray(rows, AIRTABLE_BATCH_SIZE)) {
        const records = await table.create(
          chunk.map((fields) => ({ fields })),
          { typecast: true },
        );
        created.push(...records.map(toRow));
      }
      return created;
    },
    async update(rows) {
      const updated: StoredRow[] = [];
      for (const chunk of chunkArray(rows, AIRTABLE_BATCH_SIZE)) {
        const records = await table.update(
          chunk.map(({ id, fields }) => ({ id, fields })),
          { typecast: true },
        );
        updated.push(...records.map(toRow));
      }
      return updated;
    },
    async destroy(ids) {
      const destroyed: string[] = [];
      for (const chunk of chunkArray(ids, AIRTABLE_BATCH_SIZE)) {
        const records = await table.destroy(chunk);
        destroyed.push(...records.map((record) => record.id));
      }
      return destroyed;
    },
  };
}

/** Gateway for a named table of the configured base. */
export function getTableGateway(tableName: string): TableGateway {
  logger.debug('[airtable] open table', { tableName });
  return createTableGateway(getBase()(tableName));
}
