import assert from 'node:assert/strict';
import test from 'node:test';

import type { Outcome, SendFields, SendRequest } from '../contracts/send';
import type { DeliveryClient, OutgoingMessage } from '../delivery/smtp-client';
import { RecipientDirectory } from '../directory/recipients';
import { DeliveryError, RenderExecutionError } from '../errors';
import { compileTemplate } from '../template/renderer';
import { ReplyChannel, RequestQueue } from './channels';
import { DispatchWorker } from './worker';

const HEADER = { from: 'forms@example.com', subject: 'Contact', mime: 'MIME-version: 1.0;', miscellaneous: '' };

const EMPTY_FIELDS: SendFields = {
  ipAddress: '',
  firstName: '',
  lastName: '',
  companyName: '',
  emailAddress: '',
  description: '',
};

class StubClient implements DeliveryClient {
  readonly calls: OutgoingMessage[] = [];

  constructor(private readonly failFor: ReadonlySet<string> = new Set()) {}

  async send(message: OutgoingMessage): Promise<void> {
    this.calls.push(message);
    await new Promise((resolve) => setImmediate(resolve));
    if (this.failFor.has(message.to)) {
      throw new DeliveryError('transport', message.to, `rejected ${message.to}`);
    }
  }
}

function directory() {
  return RecipientDirectory.fromRecord({
    r1: { name: 'One', title: 'First', address: 'r1@example.com', miscellaneous: null },
    r2: { name: 'Two', title: 'Second', address: 'r2@example.com', miscellaneous: null },
  });
}

function setup(templateText: string, client: DeliveryClient) {
  const queue = new RequestQueue<SendRequest>();
  const worker = new DispatchWorker({
    queue,
    template: compileTemplate(templateText),
    header: HEADER,
    directory: directory(),
    client,
    senderAddress: 'forms@example.com',
  });
  void worker.start();
  return { queue, worker };
}

function request(id: string, firstName: string): SendRequest {
  return { id, fields: { ...EMPTY_FIELDS, firstName }, receivedAt: 0, reply: new ReplyChannel<Outcome>() };
}

async function collect(reply: ReplyChannel<Outcome>, count: number): Promise<Outcome[]> {
  const outcomes: Outcome[] = [];
  for (let i = 0; i < count; i += 1) {
    outcomes.push(await reply.receive());
  }
  return outcomes;
}

test('one request fans out to every recipient in directory order', async () => {
  const client = new StubClient();
  const { queue, worker } = setup('Hello {{.FirstName}}', client);
  const req = request('req-1', 'Ana');

  await queue.put(req);
  const outcomes = await collect(req.reply, 2);

  assert.deepEqual(
    outcomes.map((outcome) => [outcome.recipientKey, outcome.ok]),
    [
      ['r1', true],
      ['r2', true],
    ],
  );
  assert.equal(client.calls.length, 2);
  assert.equal(
    client.calls[0]?.raw,
    'From: forms@example.com\nTo: r1@example.com\nSubject: Contact\nMIME-version: 1.0;\n\nHello Ana',
  );
  assert.equal(client.calls[1]?.raw.endsWith('\n\nHello Ana'), true);
  assert.deepEqual(
    client.calls.map((call) => [call.from, call.to]),
    [
      ['forms@example.com', 'r1@example.com'],
      ['forms@example.com', 'r2@example.com'],
    ],
  );
  await worker.stop();
});

test('a failing recipient does not stop delivery to the next one', async () => {
  const client = new StubClient(new Set(['r1@example.com']));
  const { queue, worker } = setup('Hello {{.FirstName}}', client);
  const first = request('req-1', 'Ana');

  await queue.put(first);
  const [failed, succeeded] = await collect(first.reply, 2);

  assert.equal(failed?.ok, false);
  assert.equal(failed?.recipientKey, 'r1');
  if (failed && !failed.ok) {
    assert.equal(failed.stage, 'delivery');
    assert.equal(failed.error.message, 'rejected r1@example.com');
  }
  assert.equal(succeeded?.ok, true);
  assert.equal(succeeded?.recipientKey, 'r2');

  const second = request('req-2', 'Bo');
  await queue.put(second);
  const next = await collect(second.reply, 2);
  assert.deepEqual(
    next.map((outcome) => outcome.requestId),
    ['req-2', 'req-2'],
  );
  await worker.stop();
  assert.equal(worker.state, 'stopped');
});

test('a render failure yields one failure per recipient without contacting the client', async () => {
  const client = new StubClient();
  const { queue, worker } = setup('Hi {{.Nickname}}', client);
  const req = request('req-1', 'Ana');

  await queue.put(req);
  const outcomes = await collect(req.reply, 2);

  assert.equal(client.calls.length, 0);
  assert.equal(req.reply.written, 2);
  for (const outcome of outcomes) {
    assert.equal(outcome.ok, false);
    if (!outcome.ok) {
      assert.equal(outcome.stage, 'render');
      assert.ok(outcome.error instanceof RenderExecutionError);
    }
  }
  assert.deepEqual(
    outcomes.map((outcome) => outcome.recipientKey),
    ['r1', 'r2'],
  );
  await worker.stop();
});

test('concurrent requests are processed whole and never interleaved', async () => {
  const client = new StubClient();
  const { queue, worker } = setup('{{.FirstName}}', client);
  const requests = [request('a', 'A'), request('b', 'B'), request('c', 'C')];

  await Promise.all(requests.map((req) => queue.put(req)));
  await Promise.all(requests.map((req) => collect(req.reply, 2)));

  const order = client.calls.map((call) => `${call.raw.slice(-1)}:${call.to}`);
  assert.deepEqual(order, [
    'A:r1@example.com',
    'A:r2@example.com',
    'B:r1@example.com',
    'B:r2@example.com',
    'C:r1@example.com',
    'C:r2@example.com',
  ]);
  await worker.stop();
});

test('rendering the same request twice produces identical bodies', async () => {
  const client = new StubClient();
  const { queue, worker } = setup('{{.FirstName}} {{.Description}}', client);
  const first = request('one', 'Ana');
  const second = request('two', 'Ana');

  await queue.put(first);
  await collect(first.reply, 2);
  await queue.put(second);
  await collect(second.reply, 2);

  assert.equal(client.calls[0]?.raw, client.calls[2]?.raw);
  assert.equal(client.calls[1]?.raw, client.calls[3]?.raw);
  await worker.stop();
});

test('state moves through delivering and back to idle', async () => {
  let observed = '';
  const queue = new RequestQueue<SendRequest>();
  const worker = new DispatchWorker({
    queue,
    template: compileTemplate('x'),
    header: HEADER,
    directory: directory(),
    client: {
      send: async () => {
        observed = worker.state;
      },
    },
    senderAddress: 'forms@example.com',
  });
  assert.equal(worker.state, 'idle');
  void worker.start();

  const req = request('req-1', 'Ana');
  await queue.put(req);
  await collect(req.reply, 2);
  assert.equal(observed, 'delivering');
  assert.equal(worker.state, 'idle');

  await worker.stop();
  assert.equal(worker.state, 'stopped');
});
