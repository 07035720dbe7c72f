import { argv, exit } from 'node:process';
import { RECORD_KINDS } from '../types';
import { AirtableRecordStore } from '../lib/crm/airtableStore';
import { MemoryRecordStore } from '../lib/crm/memoryStore';
import type { RecordStore } from '../lib/crm/store';
import {
  closeOpportunitiesForAccount,
  convertLead,
  createAccount,
  createAccountWithContacts,
  createAccountWithEmployees,
  createContactForAccount,
  createLeads,
  createOpportunity,
  deleteAccountCascade,
  deleteLeadsByStatus,
  escalateHighPriorityCases,
  openCase,
  updateAccountIndustry,
  upsertAccount,
  upsertContactsByLastName,
} from '../lib/services/crmLessons';

type StepStatus = 'PASS' | 'FAIL';

type StepResult = {
  label: string;
  status: StepStatus;
  detail?: string;
};

type LessonContext = {
  store: RecordStore;
  suffix: string;
  closeDate: string;
  ids: Map<string, string>;
};

type Step = {
  label: string;
  run: (ctx: LessonContext) => Promise<string>;
};

const CLOSE_IN_DAYS = 30;

function requireId(ctx: LessonContext, key: string): string {
  const id = ctx.ids.get(key);
  if (!id) {
    throw new Error(`step needs "${key}" from an earlier step`);
  }
  return id;
}

function isoDateInDays(days: number, reference = new Date()): string {
  const target = new Date(reference.getTime() + days * 24 * 60 * 60 * 1000);
  return target.toISOString().slice(0, 10);
}

const STEPS: readonly Step[] = [
  {
    label: '1 createAccount',
    run: async (ctx) => {
      const id = await createAccount(ctx.store, `Lesson Account ${ctx.suffix}`);
      ctx.ids.set('account', id);
      return id;
    },
  },
  {
    label: '2 createAccountWithEmployees',
    run: async (ctx) => createAccountWithEmployees(ctx.store, `Lesson Corp ${ctx.suffix}`, 120),
  },
  {
    label: '3 createContactForAccount',
    run: async (ctx) => {
      const id = await createContactForAccount(ctx.store, requireId(ctx, 'account'), {
        firstName: 'Jane',
        lastName: `Doe ${ctx.suffix}`,
        email: 'jane.doe@example.com',
      });
      ctx.ids.set('contact', id);
      return id;
    },
  },
  {
    label: '4 createAccountWithContacts',
    run: async (ctx) => {
      const id = await createAccountWithContacts(ctx.store, `Lesson Group ${ctx.suffix}`, [
        { lastName: `Roe ${ctx.suffix}`, firstName: 'Richard' },
        { lastName: `Poe ${ctx.suffix}`, firstName: 'Paula' },
      ]);
      ctx.ids.set('group', id);
      return id;
    },
  },
  {
    label: '5 createOpportunity',
    run: async (ctx) =>
      createOpportunity(
        ctx.store,
        requireId(ctx, 'account'),
        `Lesson Deal ${ctx.suffix}`,
        25000,
        ctx.closeDate,
      ),
  },
  {
    label: '6 createLeads',
    run: async (ctx) => {
      const ids = await createLeads(ctx.store, [
        { lastName: `Lee ${ctx.suffix}`, company: `Lee Trading ${ctx.suffix}`, source: 'Web' },
        { lastName: `Kim ${ctx.suffix}`, company: `Kim Works ${ctx.suffix}`, source: 'Referral' },
      ]);
      ctx.ids.set('lead', ids[0]);
      return ids.join(',');
    },
  },
  {
    label: '7 openCase',
    run: async (ctx) =>
      openCase(ctx.store, requireId(ctx, 'contact'), `Login fails ${ctx.suffix}`, 'High'),
  },
  {
    label: '8 updateAccountIndustry',
    run: async (ctx) => {
      await updateAccountIndustry(ctx.store, requireId(ctx, 'account'), 'Education');
      return 'updated';
    },
  },
  {
    label: '9 upsertAccount',
    run: async (ctx) => upsertAccount(ctx.store, `Lesson Account ${ctx.suffix}`, 250),
  },
  {
    label: '10 upsertContactsByLastName',
    run: async (ctx) => {
      const ids = await upsertContactsByLastName(ctx.store, [
        `Doe ${ctx.suffix}`,
        `Jane ${ctx.suffix}`,
        `Doe ${ctx.suffix}`,
      ]);
      return ids.join(',');
    },
  },
  {
    label: '11 closeOpportunitiesForAccount',
    run: async (ctx) =>
      String(await closeOpportunitiesForAccount(ctx.store, requireId(ctx, 'account'), true)),
  },
  {
    label: '12 convertLead',
    run: async (ctx) => {
      const { accountId, contactId } = await convertLead(ctx.store, requireId(ctx, 'lead'));
      return `account=${accountId} contact=${contactId}`;
    },
  },
  {
    label: '13 escalateHighPriorityCases',
    run: async (ctx) => String(await escalateHighPriorityCases(ctx.store)),
  },
  {
    label: '14 deleteLeadsByStatus',
    run: async (ctx) => String(await deleteLeadsByStatus(ctx.store, 'Closed - Converted')),
  },
  {
    label: '15 deleteAccountCascade',
    run: async (ctx) => {
      await deleteAccountCascade(ctx.store, requireId(ctx, 'group'));
      return 'deleted';
    },
  },
];

async function runStep(step: Step, ctx: LessonContext): Promise<StepResult> {
  try {
    const detail = await step.run(ctx);
    return { label: step.label, status: 'PASS', detail };
  } catch (error) {
    return {
      label: step.label,
      status: 'FAIL',
      detail: error instanceof Error ? `${error.name}: ${error.message}` : String(error),
    };
  }
}

async function main(): Promise<void> {
  const useMemory = argv.includes('--memory');
  try {
    const ctx: LessonContext = {
      store: useMemory ? new MemoryRecordStore() : new AirtableRecordStore(),
      suffix: Date.now().toString(36),
      closeDate: isoDateInDays(CLOSE_IN_DAYS),
      ids: new Map(),
    };
    console.log(`[lessons] store=${useMemory ? 'memory' : 'airtable'} suffix=${ctx.suffix}`);

    const results: StepResult[] = [];
    for (const step of STEPS) {
      const result = await runStep(step, ctx);
      results.push(result);
      const line = `[lessons] ${result.status} ${result.label}${
        result.detail ? ` -> ${result.detail}` : ''
      }`;
      if (result.status === 'PASS') {
        console.log(line);
      } else {
        console.error(line);
      }
    }

    if (ctx.store instanceof MemoryRecordStore) {
      const store = ctx.store;
      const counts = RECORD_KINDS.map((kind) => `${kind}=${store.count(kind)}`);
      console.log(`[lessons] rows ${counts.join(' ')}`);
    }

    const failed = results.filter((result) => result.status === 'FAIL').length;
    console.log(`[lessons] SUMMARY: ${results.length - failed} passed, ${failed} failed`);
    exit(failed > 0 ? 1 : 0);
  } catch (error) {
    console.error('[lessons] fatal error', error);
    exit(1);
  }
}

void main();
