import type { FieldName, FieldValue, RecordKind } from '@/types';
import { ValidationError } from './errors';

export type FieldSpec =
  | { type: 'text' }
  | { type: 'number'; integer?: boolean; min?: number }
  | { type: 'checkbox' }
  | { type: 'date' }
  | { type: 'picklist'; values: readonly string[] }
  | { type: 'link'; to: RecordKind };

type FieldSpecs<K extends RecordKind> = { readonly [F in FieldName<K>]-?: FieldSpec };

export interface RecordSchema<K extends RecordKind> {
  kind: K;
  table: string;
  naturalKey: FieldName<K>;
  required: readonly FieldName<K>[];
  fields: Readonly<Record<string, FieldSpec>>;
}

const ACCOUNT_FIELDS = {
  name: { type: 'text' },
  employees: { type: 'number', integer: true, min: 0 },
  industry: { type: 'text' },
  phone: { type: 'text' },
  website: { type: 'text' },
  annualRevenue: { type: 'number', min: 0 },
  active: { type: 'checkbox' },
} satisfies FieldSpecs<'Account'>;

const CONTACT_FIELDS = {
  lastName: { type: 'text' },
  firstName: { type: 'text' },
  email: { type: 'text' },
  phone: { type: 'text' },
  title: { type: 'text' },
  account: { type: 'link', to: 'Account' },
} satisfies FieldSpecs<'Contact'>;

const OPPORTUNITY_FIELDS = {
  name: { type: 'text' },
  stage: {
    type: 'picklist',
    values: [
      'Prospecting',
      'Qualification',
      'Needs Analysis',
      'Proposal',
      'Negotiation',
      'Closed Won',
      'Closed Lost',
    ],
  },
  closeDate: { type: 'date' },
  amount: { type: 'number', min: 0 },
  account: { type: 'link', to: 'Account' },
} satisfies FieldSpecs<'Opportunity'>;

const LEAD_FIELDS = {
  lastName: { type: 'text' },
  company: { type: 'text' },
  firstName: { type: 'text' },
  email: { type: 'text' },
  status: {
    type: 'picklist',
    values: [
      'Open - Not Contacted',
      'Working - Contacted',
      'Closed - Converted',
      'Closed - Not Converted',
    ],
  },
  source: { type: 'text' },
} satisfies FieldSpecs<'Lead'>;

const CASE_FIELDS = {
  subject: { type: 'text' },
  status: { type: 'picklist', values: ['New', 'Working', 'Escalated', 'Closed'] },
  priority: { type: 'picklist', values: ['Low', 'Medium', 'High'] },
  origin: { type: 'text' },
  description: { type: 'text' },
  account: { type: 'link', to: 'Account' },
  contact: { type: 'link', to: 'Contact' },
} satisfies FieldSpecs<'Case'>;

// テーブル名は環境変数で上書き可能
const RECORD_SCHEMAS: { readonly [K in RecordKind]: RecordSchema<K> } = {
  Account: {
    kind: 'Account',
    table: process.env.AIRTABLE_TABLE_ACCOUNTS ?? 'Accounts',
    naturalKey: 'name',
    required: ['name'],
    fields: ACCOUNT_FIELDS,
  },
  Contact: {
    kind: 'Contact',
    table: process.env.AIRTABLE_TABLE_CONTACTS ?? 'Contacts',
    naturalKey: 'lastName',
    required: ['lastName'],
    fields: CONTACT_FIELDS,
  },
  Opportunity: {
    kind: 'Opportunity',
    table: process.env.AIRTABLE_TABLE_OPPORTUNITIES ?? 'Opportunities',
    naturalKey: 'name',
    required: ['name', 'stage', 'closeDate'],
    fields: OPPORTUNITY_FIELDS,
  },
  Lead: {
    kind: 'Lead',
    table: process.env.AIRTABLE_TABLE_LEADS ?? 'Leads',
    naturalKey: 'lastName',
    required: ['lastName', 'company'],
    fields: LEAD_FIELDS,
  },
  Case: {
    kind: 'Case',
    table: process.env.AIRTABLE_TABLE_CASES ?? 'Cases',
    naturalKey: 'subject',
    required: ['subject', 'status'],
    fields: CASE_FIELDS,
  },
};

export function getRecordSchema<K extends RecordKind>(kind: K): RecordSchema<K> {
  return RECORD_SCHEMAS[kind];
}

export function getFieldSpec<K extends RecordKind>(
  kind: K,
  field: string,
): FieldSpec | undefined {
  const { fields } = getRecordSchema(kind);
  return Object.prototype.hasOwnProperty.call(fields, field) ? fields[field] : undefined;
}

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

function isCalendarDate(value: string): boolean {
  const match = DATE_PATTERN.exec(value);
  if (!match) {
    return false;
  }
  const [, year, month, day] = match.map(Number);
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

export function isBlank(value: unknown): boolean {
  return typeof value !== 'string' || value.trim().length === 0;
}

export type FieldCheck = { success: true; value: FieldValue } | { success: false; hint: string };

/**
 * 宣言済みスキーマに照らして 1 フィールドの値を検証し、格納可能な値として返す。
 */
export function validateFieldValue<K extends RecordKind>(
  kind: K,
  field: string,
  value: unknown,
): FieldCheck {
  const spec = getFieldSpec(kind, field);
  if (!spec) {
    return { success: false, hint: `${kind} has no field "${field}"` };
  }
  const ok = (checked: FieldValue): FieldCheck => ({ success: true, value: checked });
  const fail = (expected: string): FieldCheck => ({
    success: false,
    hint: `${kind}.${field} must be ${expected}`,
  });

  switch (spec.type) {
    case 'text':
      return typeof value === 'string' ? ok(value) : fail('a string');
    case 'number': {
      if (typeof value !== 'number' || !Number.isFinite(value)) {
        return fail('a finite number');
      }
      if (spec.integer && !Number.isInteger(value)) {
        return fail('an integer');
      }
      if (spec.min !== undefined && value < spec.min) {
        return fail(`at least ${spec.min}`);
      }
      return ok(value);
    }
    case 'checkbox':
      return typeof value === 'boolean' ? ok(value) : fail('a boolean');
    case 'date':
      return typeof value === 'string' && isCalendarDate(value)
        ? ok(value)
        : fail('a YYYY-MM-DD date');
    case 'picklist':
      return typeof value === 'string' && spec.values.includes(value)
        ? ok(value)
        : fail(`one of ${spec.values.join(', ')}`);
    case 'link': {
      if (!Array.isArray(value)) {
        return fail(`a list of ${spec.to} record IDs`);
      }
      const ids: string[] = [];
      for (const item of value) {
        if (typeof item !== 'string' || isBlank(item)) {
          return fail(`a list of ${spec.to} record IDs`);
        }
        ids.push(item);
      }
      return ok(ids);
    }
  }
}

/** Same check as `validateFieldValue`, throwing ValidationError on failure. */
export function coerceFieldValue<K extends RecordKind>(
  kind: K,
  field: string,
  value: unknown,
): FieldValue {
  const result = validateFieldValue(kind, field, value);
  if (!result.success) {
    throw new ValidationError(result.hint);
  }
  return result.value;
}

/** Checks the fields a brand-new record must carry before it can be created. */
export function assertCreatable<K extends RecordKind>(
  kind: K,
  values: ReadonlyMap<string, FieldValue>,
): void {
  const schema = getRecordSchema(kind);
  const missing = schema.required.filter((field) => !values.has(field));
  if (missing.length > 0) {
    throw new ValidationError(`${kind} is missing required field(s): ${missing.join(', ')}`);
  }
  if (isBlank(values.get(schema.naturalKey))) {
    throw new ValidationError(`${kind}.${schema.naturalKey} must not be blank`);
  }
}
