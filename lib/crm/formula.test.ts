import test from 'node:test';
import assert from 'node:assert/strict';
import {
  buildConditionFormula,
  buildRecordIdFormula,
  escapeFormulaValue,
  splitLinkConditions,
} from './formula';

test('no conditions means no formula', () => {
  assert.equal(buildConditionFormula('Account', []), undefined);
});

test('text equality quotes and escapes the value', () => {
  assert.equal(
    buildConditionFormula('Account', [{ field: 'name', value: "O'Brien & Co" }]),
    "({name}='O\\'Brien & Co')",
  );
  assert.equal(escapeFormulaValue('a\\b'), 'a\\\\b');
});

test('numbers and checkboxes are written as literals', () => {
  assert.equal(
    buildConditionFormula('Account', [{ field: 'employees', value: 5 }]),
    '({employees}=5)',
  );
  assert.equal(
    buildConditionFormula('Account', [{ field: 'active', value: true }]),
    '({active}=TRUE())',
  );
});

test('lists become OR and several conditions become AND', () => {
  assert.equal(
    buildConditionFormula('Account', [{ field: 'name', value: ['Acme', 'Globex'] }]),
    "OR(({name}='Acme'),({name}='Globex'))",
  );
  assert.equal(
    buildConditionFormula('Case', [
      { field: 'priority', value: 'High' },
      { field: 'status', value: ['New', 'Working'] },
    ]),
    "AND(({priority}='High'),OR(({status}='New'),({status}='Working')))",
  );
});

test('link conditions are kept out of formulas', () => {
  assert.throws(
    () => buildConditionFormula('Contact', [{ field: 'account', value: 'recAcc' }]),
    {
      name: 'ValidationError',
      message: 'Contact.account is a link field and cannot be used in a formula',
    },
  );
  const split = splitLinkConditions('Case', [
    { field: 'contact', value: 'recDoe' },
    { field: 'status', value: 'New' },
    { field: 'account', value: ['recA', 'recB'] },
  ]);
  assert.deepEqual(split.columns, [{ field: 'status', value: 'New' }]);
  assert.deepEqual(split.links, [
    { field: 'contact', value: 'recDoe' },
    { field: 'account', value: ['recA', 'recB'] },
  ]);
});

test('an empty list never matches', () => {
  assert.equal(buildConditionFormula('Lead', [{ field: 'lastName', value: [] }]), 'FALSE()');
});

test('record ID formula', () => {
  assert.equal(buildRecordIdFormula(['recA']), "RECORD_ID()='recA'");
  assert.equal(
    buildRecordIdFormula(['recA', 'recB']),
    "OR(RECORD_ID()='recA',RECORD_ID()='recB')",
  );
});
