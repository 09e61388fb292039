import assert from 'node:assert/strict';
import test from 'node:test';

import { RecipientDirectory } from './recipients';

const DOCS = { name: 'Docs Desk', title: 'Documentation', address: 'docs@example.com', miscellaneous: null };
const SALES = { name: 'Sales', title: 'Account team', address: 'sales@example.com', miscellaneous: { region: 'eu' } };

test('snapshot keeps declaration order and is stable across calls', () => {
  const directory = RecipientDirectory.fromRecord({ docs: DOCS, sales: SALES });
  const first = directory.snapshot();
  assert.deepEqual(
    first.map((recipient) => recipient.key),
    ['docs', 'sales'],
  );
  assert.equal(directory.snapshot(), first);
  assert.equal(directory.size, 2);
});

test('entries are frozen copies of the loaded data', () => {
  const source = { ...DOCS };
  const directory = RecipientDirectory.fromRecord({ docs: source });
  source.address = 'changed@example.com';

  const docs = directory.get('docs');
  assert.equal(docs?.address, 'docs@example.com');
  assert.equal(Object.isFrozen(docs), true);
  assert.equal(Object.isFrozen(directory.snapshot()), true);
});

test('get returns undefined for an unknown key', () => {
  const directory = RecipientDirectory.fromRecord({ docs: DOCS });
  assert.equal(directory.get('nobody'), undefined);
});

test('fromEntries rejects duplicate keys', () => {
  assert.throws(
    () =>
      RecipientDirectory.fromEntries([
        ['docs', DOCS],
        ['docs', SALES],
      ]),
    /Duplicate recipient key: docs/,
  );
});
