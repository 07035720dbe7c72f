// 各レコード種別のフィールド型定義（Airtable のカラム名と一致させる）
export type RecordKind = 'Account' | 'Contact' | 'Opportunity' | 'Lead' | 'Case';

export const RECORD_KINDS: readonly RecordKind[] = [
  'Account',
  'Contact',
  'Opportunity',
  'Lead',
  'Case',
];

export type OpportunityStage =
  | 'Prospecting'
  | 'Qualification'
  | 'Needs Analysis'
  | 'Proposal'
  | 'Negotiation'
  | 'Closed Won'
  | 'Closed Lost';

export type LeadStatus =
  | 'Open - Not Contacted'
  | 'Working - Contacted'
  | 'Closed - Converted'
  | 'Closed - Not Converted';

export type CaseStatus = 'New' | 'Working' | 'Escalated' | 'Closed';

export type CasePriority = 'Low' | 'Medium' | 'High';

export interface AccountFields {
  name: string;
  employees?: number;
  industry?: string;
  phone?: string;
  website?: string;
  annualRevenue?: number;
  active?: boolean;
}

export interface ContactFields {
  lastName: string;
  firstName?: string;
  email?: string;
  phone?: string;
  title?: string;
  account?: readonly string[]; // Link to Accounts (record IDs)
}

export interface OpportunityFields {
  name: string;
  stage: OpportunityStage;
  closeDate: string; // YYYY-MM-DD
  amount?: number;
  account?: readonly string[]; // Link to Accounts (record IDs)
}

export interface LeadFields {
  lastName: string;
  company: string;
  firstName?: string;
  email?: string;
  status?: LeadStatus;
  source?: string;
}

export interface CaseFields {
  subject: string;
  status: CaseStatus;
  priority?: CasePriority;
  origin?: string;
  description?: string;
  account?: readonly string[]; // Link to Accounts (record IDs)
  contact?: readonly string[]; // Link to Contacts (record IDs)
}

export interface RecordFieldMap {
  Account: AccountFields;
  Contact: ContactFields;
  Opportunity: OpportunityFields;
  Lead: LeadFields;
  Case: CaseFields;
}

export type FieldName<K extends RecordKind> = keyof RecordFieldMap[K] & string;

export type FieldValues<K extends RecordKind> = Partial<RecordFieldMap[K]>;

export type ScalarValue = string | number | boolean;

export type FieldValue = ScalarValue | readonly string[];
