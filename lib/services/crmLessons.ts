// lib/services/crmLessons.ts
// Account / Contact / Opportunity / Lead / Case を使った作成・更新・upsert・削除の練習問題集
// ストアは必ず引数で受け取る（グローバルな接続は持たない）
import type {
  CasePriority,
  ContactFields,
  FieldValues,
  LeadFields,
  LeadStatus,
  OpportunityStage,
  RecordKind,
} from '@/types';
import { logger } from '@/lib/logger';
import { BackingStoreError, NotFoundError, ValidationError } from '@/lib/crm/errors';
import { CrmRecord } from '@/lib/crm/record';
import type { RecordStore } from '@/lib/crm/store';
import { createRecordUpsertHelper } from '@/lib/crm/upsert';

export type NewContact = Pick<ContactFields, 'lastName' | 'firstName' | 'email' | 'title'>;

export type NewLead = Pick<LeadFields, 'lastName' | 'company' | 'firstName' | 'email' | 'source'>;

export type ConvertedLead = { accountId: string; contactId: string };

const CLOSED_STAGES: readonly OpportunityStage[] = ['Closed Won', 'Closed Lost'];

function persistedId(record: CrmRecord): string {
  if (record.id === null) {
    throw new BackingStoreError(`${record.kind} came back from the store without an ID`);
  }
  return record.id;
}

async function requireRecord<K extends RecordKind>(
  store: RecordStore,
  kind: K,
  id: string,
): Promise<CrmRecord<K>> {
  const [record] = await store.retrieve(kind, [id]);
  if (!record) {
    throw new NotFoundError(`${kind} ${id} not found`, [id]);
  }
  return record;
}

function contactRecord(accountId: string, contact: NewContact): CrmRecord<'Contact'> {
  return new CrmRecord('Contact', { ...contact, account: [accountId] });
}

/** 1. Insert a single Account and return its ID. */
export async function createAccount(store: RecordStore, name: string): Promise<string> {
  const [account] = await store.write([new CrmRecord('Account', { name })], 'create');
  logger.info('[lessons] createAccount', { id: account.id, name });
  return persistedId(account);
}

/** 2. Insert an Account with its employee count. */
export async function createAccountWithEmployees(
  store: RecordStore,
  name: string,
  employees: number,
): Promise<string> {
  const [account] = await store.write([new CrmRecord('Account', { name, employees })], 'create');
  logger.info('[lessons] createAccountWithEmployees', { id: account.id, name, employees });
  return persistedId(account);
}

/** 3. Insert a Contact under an existing Account. */
export async function createContactForAccount(
  store: RecordStore,
  accountId: string,
  contact: NewContact,
): Promise<string> {
  await requireRecord(store, 'Account', accountId);
  const [created] = await store.write([contactRecord(accountId, contact)], 'create');
  logger.info('[lessons] createContactForAccount', { id: created.id, accountId });
  return persistedId(created);
}

/**
 * 4. Insert an Account, then all of its Contacts in one batch.
 * The Account must exist before the Contacts can link to it.
 */
export async function createAccountWithContacts(
  store: RecordStore,
  accountName: string,
  contacts: readonly NewContact[],
): Promise<string> {
  const accountId = await createAccount(store, accountName);
  if (contacts.length > 0) {
    await store.write(
      contacts.map((contact) => contactRecord(accountId, contact)),
      'create',
    );
  }
  logger.info('[lessons] createAccountWithContacts', { accountId, contacts: contacts.length });
  return accountId;
}

/** 5. Insert an Opportunity in the Prospecting stage. */
export async function createOpportunity(
  store: RecordStore,
  accountId: string,
  name: string,
  amount: number,
  closeDate: string,
): Promise<string> {
  const opportunity = new CrmRecord('Opportunity', {
    name,
    amount,
    closeDate,
    stage: 'Prospecting',
    account: [accountId],
  });
  const [created] = await store.write([opportunity], 'create');
  logger.info('[lessons] createOpportunity', { id: created.id, accountId, amount });
  return persistedId(created);
}

/** 6. Insert several Leads with one write; IDs come back in input order. */
export async function createLeads(
  store: RecordStore,
  leads: readonly NewLead[],
): Promise<string[]> {
  if (leads.length === 0) {
    return [];
  }
  const records = leads.map(
    (lead) => new CrmRecord('Lead', { ...lead, status: 'Open - Not Contacted' }),
  );
  const created = await store.write(records, 'create');
  logger.info('[lessons] createLeads', { count: created.length });
  return created.map(persistedId);
}

/** 7. Open a Case for a Contact, linked to the Contact's Account when it has one. */
export async function openCase(
  store: RecordStore,
  contactId: string,
  subject: string,
  priority: CasePriority = 'Medium',
): Promise<string> {
  const contact = await requireRecord(store, 'Contact', contactId);
  const account = contact.getLinks('account');
  const ticket = new CrmRecord('Case', {
    subject,
    priority,
    status: 'New',
    contact: [contactId],
    account: account.length > 0 ? account : undefined,
  });
  const [created] = await store.write([ticket], 'create');
  logger.info('[lessons] openCase', { id: created.id, contactId, priority });
  return persistedId(created);
}

/** 8. Update an Account by ID without querying it first. */
export async function updateAccountIndustry(
  store: RecordStore,
  accountId: string,
  industry: string,
): Promise<void> {
  const account = CrmRecord.reference('Account', accountId).set('industry', industry);
  await store.write([account], 'update');
  logger.info('[lessons] updateAccountIndustry', { accountId, industry });
}

/** 9. Update the Account with this name if there is one, otherwise insert it. */
export async function upsertAccount(
  store: RecordStore,
  name: string,
  employees: number,
): Promise<string> {
  const accounts = createRecordUpsertHelper(store, 'Account');
  const account = await accounts.findOrCreate(name, { employees }, { employees });
  return persistedId(account);
}

/** 10. Upsert one Contact per last name; repeated names map to the same Contact. */
export async function upsertContactsByLastName(
  store: RecordStore,
  lastNames: readonly string[],
  fields: FieldValues<'Contact'> = {},
): Promise<string[]> {
  const contacts = createRecordUpsertHelper(store, 'Contact');
  const records = await contacts.batchUpsertByName(lastNames, () => fields);
  return records.map(persistedId);
}

/** 11. Close every open Opportunity of an Account; returns how many changed. */
export async function closeOpportunitiesForAccount(
  store: RecordStore,
  accountId: string,
  won: boolean,
): Promise<number> {
  const opportunities = await store.query('Opportunity', [{ field: 'account', value: accountId }]);
  const open = opportunities.filter((opportunity) => {
    const stage = opportunity.getString('stage');
    return !CLOSED_STAGES.some((closed) => closed === stage);
  });
  if (open.length === 0) {
    return 0;
  }
  const stage: OpportunityStage = won ? 'Closed Won' : 'Closed Lost';
  for (const opportunity of open) {
    opportunity.set('stage', stage);
  }
  await store.write(open, 'update');
  logger.info('[lessons] closeOpportunitiesForAccount', { accountId, stage, count: open.length });
  return open.length;
}

/**
 * 12. Convert a Lead: upsert an Account by the Lead's company, add a Contact
 * under it and mark the Lead converted.
 */
export async function convertLead(store: RecordStore, leadId: string): Promise<ConvertedLead> {
  const lead = await requireRecord(store, 'Lead', leadId);
  const converted: LeadStatus = 'Closed - Converted';
  if (lead.getString('status') === converted) {
    throw new ValidationError(`Lead ${leadId} has already been converted`);
  }
  const company = lead.getString('company');
  const lastName = lead.getString('lastName');
  if (!company || !lastName) {
    throw new ValidationError(`Lead ${leadId} needs a company and a last name to convert`);
  }

  const account = await createRecordUpsertHelper(store, 'Account').findOrCreate(company, {});
  const accountId = persistedId(account);
  const contactId = await createContactForAccount(store, accountId, {
    lastName,
    firstName: lead.getString('firstName') ?? undefined,
    email: lead.getString('email') ?? undefined,
  });

  lead.set('status', converted);
  await store.write([lead], 'update');
  logger.info('[lessons] convertLead', { leadId, accountId, contactId });
  return { accountId, contactId };
}

/** 13. Escalate open high-priority Cases; returns how many changed. */
export async function escalateHighPriorityCases(store: RecordStore): Promise<number> {
  const cases = await store.query('Case', [
    { field: 'priority', value: 'High' },
    { field: 'status', value: ['New', 'Working'] },
  ]);
  if (cases.length === 0) {
    return 0;
  }
  for (const ticket of cases) {
    ticket.set('status', 'Escalated');
  }
  await store.write(cases, 'update');
  logger.info('[lessons] escalateHighPriorityCases', { count: cases.length });
  return cases.length;
}

/** 14. Delete every Lead with the given status; returns how many were removed. */
export async function deleteLeadsByStatus(
  store: RecordStore,
  status: LeadStatus,
): Promise<number> {
  const leads = await store.query('Lead', [{ field: 'status', value: status }]);
  await createRecordUpsertHelper(store, 'Lead').deleteAll(leads);
  return leads.length;
}

/** 15. Delete an Account together with its Cases, Opportunities and Contacts. */
export async function deleteAccountCascade(store: RecordStore, accountId: string): Promise<void> {
  const account = await requireRecord(store, 'Account', accountId);
  const cases = await store.query('Case', [{ field: 'account', value: accountId }]);
  const opportunities = await store.query('Opportunity', [{ field: 'account', value: accountId }]);
  const contacts = await store.query('Contact', [{ field: 'account', value: accountId }]);
  await store.delete([...cases, ...opportunities, ...contacts, account]);
  logger.info('[lessons] deleteAccountCascade', {
    accountId,
    cases: cases.length,
    opportunities: opportunities.length,
    contacts: contacts.length,
  });
}
