import assert from 'node:assert/strict';
import test from 'node:test';

import { parseCliOptions } from './cli';

const run = (...flags: string[]) => parseCliOptions(['node', 'contact-dispatch', ...flags]);

test('parseCliOptions reads the short and long config flags', () => {
  assert.equal(run('-c', '/etc/docs.yaml').configFile, '/etc/docs.yaml');
  assert.equal(run('--config-file', '/etc/docs.yaml').configFile, '/etc/docs.yaml');
  assert.equal(run('--configFile', '/etc/docs.yaml').configFile, '/etc/docs.yaml');
});

test('parseCliOptions accepts the single-dash configFile spelling', () => {
  assert.equal(run('-configFile', '/etc/docs.yaml').configFile, '/etc/docs.yaml');
  assert.equal(run('-configFile=/etc/docs.yaml').configFile, '/etc/docs.yaml');
});

test('parseCliOptions leaves configFile unset without a flag', () => {
  assert.deepEqual(run(), {});
  assert.deepEqual(run('--verify'), { verify: true });
});
