import test from 'node:test';
import assert from 'node:assert/strict';
import { NotFoundError, StaleReferenceError, ValidationError } from './errors';
import { MemoryRecordStore } from './memoryStore';
import { CrmRecord } from './record';

process.env.LOG_LEVEL = 'silent';

function idOf(record: CrmRecord): string {
  assert.ok(record.id);
  return record.id;
}

test('create assigns IDs in order and returns the same instances', async () => {
  const store = new MemoryRecordStore();
  const acme = new CrmRecord('Account', { name: 'Acme' });
  const globex = new CrmRecord('Account', { name: 'Globex' });

  const written = await store.write([acme, globex], 'create');

  assert.equal(written[0], acme);
  assert.equal(written[1], globex);
  assert.equal(acme.id, 'rec00000000000001');
  assert.equal(globex.id, 'rec00000000000002');
  assert.equal(acme.state, 'persistent');
  assert.equal(store.count('Account'), 2);
});

test('create refuses records that already have an ID', async () => {
  const store = new MemoryRecordStore();
  const [acme] = await store.write([new CrmRecord('Account', { name: 'Acme' })], 'create');
  await assert.rejects(store.write([acme], 'create'), ValidationError);
  assert.equal(store.count('Account'), 1);
});

test('update needs a persisted record the store still holds', async () => {
  const store = new MemoryRecordStore();
  await assert.rejects(
    store.write([new CrmRecord('Account', { name: 'Acme' })], 'update'),
    NotFoundError,
  );
  const ghost = CrmRecord.reference('Account', 'recMissing').set('industry', 'Retail');
  await assert.rejects(store.write([ghost], 'update'), (error: unknown) => {
    assert.ok(error instanceof NotFoundError);
    assert.deepEqual(error.recordIds, ['recMissing']);
    return true;
  });
});

test('missing required fields fail before anything is stored', async () => {
  const store = new MemoryRecordStore();
  const good = new CrmRecord('Lead', { lastName: 'Lee', company: 'Lee Trading' });
  const bad = new CrmRecord('Lead', { lastName: 'Kim' });
  await assert.rejects(store.write([good, bad], 'create'), {
    name: 'ValidationError',
    message: 'Lead is missing required field(s): company',
  });
  assert.equal(store.count('Lead'), 0);
  assert.equal(good.id, null);
});

test('a batch holds one kind of record', async () => {
  const store = new MemoryRecordStore();
  await assert.rejects(
    store.write(
      [
        new CrmRecord('Account', { name: 'Acme' }),
        new CrmRecord('Contact', { lastName: 'Doe' }),
      ],
      'create',
    ),
    {
      name: 'ValidationError',
      message: 'A write batch holds one record kind (got Account and Contact)',
    },
  );
});

test('links must point at existing records and the batch stays atomic', async () => {
  const store = new MemoryRecordStore();
  const [acme] = await store.write([new CrmRecord('Account', { name: 'Acme' })], 'create');
  const linked = new CrmRecord('Contact', { lastName: 'Doe', account: [idOf(acme)] });
  const broken = new CrmRecord('Contact', { lastName: 'Roe', account: ['recNowhere'] });

  await assert.rejects(store.write([linked, broken], 'upsert'), {
    name: 'ValidationError',
    message: 'Contact.account links to unknown Account record(s): recNowhere',
  });
  assert.equal(store.count('Contact'), 0);

  await store.write([linked], 'create');
  assert.equal(store.count('Contact'), 1);
});

test('upsert creates new records and updates persisted ones', async () => {
  const store = new MemoryRecordStore();
  const [acme] = await store.write([new CrmRecord('Account', { name: 'Acme' })], 'create');
  acme.set('employees', 40);
  const globex = new CrmRecord('Account', { name: 'Globex' });

  await store.write([acme, globex], 'upsert');

  const rows = await store.query('Account');
  assert.deepEqual(
    rows.map((row) => row.toFields()),
    [{ name: 'Acme', employees: 40 }, { name: 'Globex' }],
  );
});

test('updates merge only the changed fields', async () => {
  const store = new MemoryRecordStore();
  const [acme] = await store.write(
    [new CrmRecord('Account', { name: 'Acme', industry: 'Retail' })],
    'create',
  );
  const handle = CrmRecord.reference('Account', idOf(acme)).set('employees', 12);
  await store.write([handle], 'update');

  const [row] = await store.retrieve('Account', [idOf(acme)]);
  assert.deepEqual(row.toFields(), { name: 'Acme', industry: 'Retail', employees: 12 });
});

test('query matches equality, lists, links and combinations', async () => {
  const store = new MemoryRecordStore();
  const [acme, globex] = await store.write(
    [new CrmRecord('Account', { name: 'Acme' }), new CrmRecord('Account', { name: 'Globex' })],
    'create',
  );
  await store.write(
    [
      new CrmRecord('Contact', { lastName: 'Doe', title: 'CEO', account: [idOf(acme)] }),
      new CrmRecord('Contact', { lastName: 'Roe', title: 'CTO', account: [idOf(acme)] }),
      new CrmRecord('Contact', { lastName: 'Poe', title: 'CEO', account: [idOf(globex)] }),
    ],
    'create',
  );

  const byName = await store.query('Contact', [{ field: 'lastName', value: 'Roe' }]);
  assert.deepEqual(byName.map((row) => row.naturalKeyValue()), ['Roe']);

  const byList = await store.query('Contact', [
    { field: 'lastName', value: ['Poe', 'Doe', 'Zoe'] },
  ]);
  assert.deepEqual(byList.map((row) => row.naturalKeyValue()), ['Doe', 'Poe']);

  const byLink = await store.query('Contact', [{ field: 'account', value: idOf(acme) }]);
  assert.deepEqual(byLink.map((row) => row.naturalKeyValue()), ['Doe', 'Roe']);

  const combined = await store.query('Contact', [
    { field: 'account', value: idOf(acme) },
    { field: 'title', value: 'CEO' },
  ]);
  assert.deepEqual(combined.map((row) => row.naturalKeyValue()), ['Doe']);

  assert.deepEqual(await store.query('Contact', [{ field: 'lastName', value: [] }]), []);
});

test('query returns fresh handles', async () => {
  const store = new MemoryRecordStore();
  const [acme] = await store.write([new CrmRecord('Account', { name: 'Acme' })], 'create');
  const [found] = await store.query('Account', [{ field: 'name', value: 'Acme' }]);
  assert.notEqual(found, acme);
  assert.equal(found.id, acme.id);
  assert.equal(found.state, 'persistent');
});

test('retrieve skips unknown IDs', async () => {
  const store = new MemoryRecordStore();
  const [acme] = await store.write([new CrmRecord('Account', { name: 'Acme' })], 'create');
  const rows = await store.retrieve('Account', ['recUnknown', idOf(acme), idOf(acme)]);
  assert.deepEqual(rows.map((row) => row.id), [acme.id]);
});

test('delete marks records deleted and later writes go stale', async () => {
  const store = new MemoryRecordStore();
  const [acme] = await store.write([new CrmRecord('Account', { name: 'Acme' })], 'create');

  await store.delete([acme]);

  assert.equal(acme.state, 'deleted');
  assert.equal(store.count('Account'), 0);
  acme.set('industry', 'Retail');
  await assert.rejects(store.write([acme], 'update'), StaleReferenceError);
  await assert.rejects(store.write([acme], 'upsert'), StaleReferenceError);
  await assert.rejects(store.delete([acme]), NotFoundError);
});

test('other handles on a deleted record dangle', async () => {
  const store = new MemoryRecordStore();
  const [acme] = await store.write([new CrmRecord('Account', { name: 'Acme' })], 'create');
  const [copy] = await store.query('Account');
  await store.delete([acme]);

  copy.set('industry', 'Retail');
  await assert.rejects(store.write([copy], 'update'), NotFoundError);
  await assert.rejects(store.delete([copy]), NotFoundError);
});

test('delete refuses unsaved records', async () => {
  const store = new MemoryRecordStore();
  await assert.rejects(store.delete([new CrmRecord('Lead', { lastName: 'Lee' })]), {
    name: 'NotFoundError',
    message: 'Lead (unsaved) is not a persisted record',
  });
});

test('deleting a record removes links to it', async () => {
  const store = new MemoryRecordStore();
  const [acme] = await store.write([new CrmRecord('Account', { name: 'Acme' })], 'create');
  await store.write(
    [new CrmRecord('Contact', { lastName: 'Doe', account: [idOf(acme)] })],
    'create',
  );

  await store.delete([acme]);

  const [doe] = await store.query('Contact');
  assert.deepEqual(doe.getLinks('account'), []);
});

test('every call is recorded', async () => {
  const store = new MemoryRecordStore();
  const [acme] = await store.write([new CrmRecord('Account', { name: 'Acme' })], 'create');
  await store.query('Account');
  await store.delete([acme]);
  assert.deepEqual(store.calls, [
    { op: 'write', kind: 'Account', mode: 'create', size: 1 },
    { op: 'query', kind: 'Account' },
    { op: 'delete', size: 1 },
  ]);
});
