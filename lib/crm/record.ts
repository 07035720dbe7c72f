import type {
  FieldName,
  FieldValue,
  FieldValues,
  RecordFieldMap,
  RecordKind,
} from '@/types';
import { StaleReferenceError, ValidationError } from './errors';
import { coerceFieldValue, getFieldSpec, getRecordSchema } from './schema';

export type RecordState = 'transient' | 'persistent' | 'deleted';

export type RecordFields = { [field: string]: FieldValue };

/**
 * One row of a CRM table.
 *
 * Field values are checked against the kind's declared schema as they are
 * assigned. The identifier is `null` until a store persists the record and
 * never changes afterwards.
 */
export class CrmRecord<K extends RecordKind = RecordKind> {
  readonly kind: K;
  private recordId: string | null = null;
  private lifecycle: RecordState = 'transient';
  private readonly values = new Map<string, FieldValue>();
  private readonly changed = new Set<string>();

  constructor(kind: K, fields: FieldValues<K> = {}) {
    this.kind = kind;
    this.assign(fields);
  }

  /** A persisted record rebuilt from a store row. */
  static hydrate<K extends RecordKind>(
    kind: K,
    id: string,
    fields: Readonly<Record<string, unknown>>,
  ): CrmRecord<K> {
    const record = new CrmRecord(kind);
    for (const [field, value] of Object.entries(fields)) {
      record.put(field, value);
    }
    record.markPersisted(id);
    return record;
  }

  /** A handle on an existing record by identifier only, for updates without a prior query. */
  static reference<K extends RecordKind>(kind: K, id: string): CrmRecord<K> {
    const record = new CrmRecord(kind);
    record.markPersisted(id);
    return record;
  }

  get id(): string | null {
    return this.recordId;
  }

  get state(): RecordState {
    return this.lifecycle;
  }

  get(field: FieldName<K>): FieldValue | undefined {
    return this.values.get(field);
  }

  getString(field: FieldName<K>): string | null {
    const value = this.values.get(field);
    return typeof value === 'string' ? value : null;
  }

  getNumber(field: FieldName<K>): number | null {
    const value = this.values.get(field);
    return typeof value === 'number' ? value : null;
  }

  getLinks(field: FieldName<K>): readonly string[] {
    const value = this.values.get(field);
    return typeof value === 'object' ? value : [];
  }

  set<F extends FieldName<K>>(field: F, value: RecordFieldMap[K][F]): this {
    this.put(field, value);
    return this;
  }

  assign(fields: FieldValues<K>): this {
    const entries: [string, unknown][] = Object.entries(fields);
    for (const [field, value] of entries) {
      this.put(field, value);
    }
    return this;
  }

  /** Value of the kind's natural key field (name, lastName or subject). */
  naturalKeyValue(): string | null {
    const value = this.values.get(getRecordSchema(this.kind).naturalKey);
    return typeof value === 'string' ? value : null;
  }

  setNaturalKeyValue(value: string): this {
    this.put(getRecordSchema(this.kind).naturalKey, value);
    return this;
  }

  /** Every field currently held. */
  toFields(): RecordFields {
    return Object.fromEntries(this.values);
  }

  /** Fields assigned since the record was last persisted. */
  changedFields(): RecordFields {
    const fields: RecordFields = {};
    for (const field of this.changed) {
      const value = this.values.get(field);
      if (value !== undefined) {
        fields[field] = value;
      }
    }
    return fields;
  }

  fieldMap(): ReadonlyMap<string, FieldValue> {
    return this.values;
  }

  markPersisted(id: string): void {
    if (this.lifecycle === 'deleted') {
      throw new StaleReferenceError(this.recordId);
    }
    if (this.recordId !== null && this.recordId !== id) {
      throw new ValidationError(
        `${this.kind} ${this.recordId} cannot be re-assigned identifier ${id}`,
      );
    }
    this.recordId = id;
    this.lifecycle = 'persistent';
    this.changed.clear();
  }

  markDeleted(): void {
    this.lifecycle = 'deleted';
  }

  private put(field: string, value: unknown): void {
    // undefined は「指定なし」扱い
    if (value === undefined) {
      if (!getFieldSpec(this.kind, field)) {
        throw new ValidationError(`${this.kind} has no field "${field}"`);
      }
      return;
    }
    this.values.set(field, coerceFieldValue(this.kind, field, value));
    this.changed.add(field);
  }
}
