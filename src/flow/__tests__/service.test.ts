import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';

import { AnalysisClient, AnalysisRequest } from '../../analysis/client';
import { AnalysisError, AnalysisResult } from '../../analysis/types';
import { ConflictError, err, ok, Result, StorageError } from '../../errors';
import { Notifier } from '../../notify/mailer';
import { OrderStore } from '../../orders/store';
import { SimulatedPaymentGateway } from '../../payment/gateway';
import { AnalysisFailedError, FlowService } from '../service';
import { SessionRegistry } from '../sessions';
import { DEED, GAP_REPORT } from './fixtures';

type Answer = (filePath: string) => Promise<Result<AnalysisResult, AnalysisError>>;

// Skips the remote service; records the temp file each call was given.
class StubAnalysisClient extends AnalysisClient {
  paths: string[] = [];

  constructor(private answer: Answer = async () => ok(GAP_REPORT)) {
    super(
      () => {
        throw new Error('not used');
      },
      { pollIntervalMs: 1, maxWaitMs: 1, rateLimitRetryMs: 0 },
    );
  }

  async analyze(request: AnalysisRequest): Promise<Result<AnalysisResult, AnalysisError>> {
    this.paths.push(request.filePath);
    return this.answer(request.filePath);
  }
}

class CountingNotifier implements Notifier {
  sent: string[] = [];

  async sendConfirmation(email: string): Promise<boolean> {
    this.sent.push(email);
    await new Promise((resolve) => setImmediate(resolve));
    return true;
  }
}

class FailingOrderStore extends OrderStore {
  createOrder(): number {
    throw new StorageError('Failed to save order');
  }
}

const FIELDS = { name: 'Asha Patil', email: 'asha@example.com', phone: '98765 43210' };

function setup(options: { analysis?: StubAnalysisClient; orders?: OrderStore } = {}) {
  const analysis = options.analysis ?? new StubAnalysisClient();
  const orders = options.orders ?? new OrderStore(':memory:');
  const notifier = new CountingNotifier();
  let charges = 0;
  const payments = new SimulatedPaymentGateway(0, async () => {
    charges += 1;
    await new Promise((resolve) => setImmediate(resolve));
  });
  const flow = new FlowService({
    sessions: new SessionRegistry(),
    analysis,
    orders,
    notifier,
    payments,
    pricing: { unlock: 99, order: 499 },
    defaultApiKey: 'test-key',
  });
  return { flow, analysis, orders, notifier, charges: () => charges };
}

function readySession(flow: FlowService): string {
  const { id } = flow.create();
  flow.acceptDisclaimer(id);
  flow.selectStage(id, 'TokenPayment');
  flow.attachDocument(id, DEED);
  return id;
}

function rejectionOf(outcome: PromiseSettledResult<unknown>): unknown {
  return outcome.status === 'rejected' ? outcome.reason : undefined;
}

test('a temp directory that cannot be created leaves the session ready to retry', async () => {
  const { flow } = setup();
  const id = readySession(flow);
  const previous = process.env.TMPDIR;

  process.env.TMPDIR = path.join(__dirname, 'no-such-dir', 'nested');
  try {
    await assert.rejects(flow.analyze(id), (error: unknown) => error instanceof Error && /ENOENT/.test(error.message));
  } finally {
    if (previous === undefined) delete process.env.TMPDIR;
    else process.env.TMPDIR = previous;
  }

  const after = flow.get(id);
  assert.equal(after.state.name, 'Ready');
  assert.equal(after.lastError?.kind, 'Other');

  const retried = await flow.analyze(id);
  assert.equal(retried.state.name, 'Locked');
});

test('the temp file is removed when the analysis reports an error', async () => {
  const analysis = new StubAnalysisClient(async () =>
    err<AnalysisError>({ kind: 'MalformedResponse', message: 'AI returned invalid JSON', rawText: 'illegible' }),
  );
  const { flow } = setup({ analysis });
  const id = readySession(flow);

  await assert.rejects(flow.analyze(id), AnalysisFailedError);

  assert.equal(analysis.paths.length, 1);
  assert.equal(fs.existsSync(analysis.paths[0]), false);
  assert.equal(fs.existsSync(path.dirname(analysis.paths[0])), false);
  assert.equal(flow.get(id).state.name, 'Ready');
});

test('the temp file is removed when the analysis throws', async () => {
  const analysis = new StubAnalysisClient(async (filePath) => {
    assert.equal(fs.readFileSync(filePath, 'utf8'), '%PDF-1.4\n');
    throw new Error('connection reset');
  });
  const { flow } = setup({ analysis });
  const id = readySession(flow);

  await assert.rejects(flow.analyze(id), /connection reset/);

  assert.equal(fs.existsSync(analysis.paths[0]), false);
  assert.deepEqual(flow.get(id).lastError, { kind: 'Other', message: 'connection reset' });
  assert.equal(flow.get(id).state.name, 'Ready');
});

test('two unlocks at once charge once', async () => {
  const { flow, charges } = setup();
  const id = readySession(flow);
  await flow.analyze(id);

  const outcomes = await Promise.allSettled([flow.unlock(id), flow.unlock(id)]);

  assert.equal(outcomes[0].status, 'fulfilled');
  assert.ok(rejectionOf(outcomes[1]) instanceof ConflictError);
  assert.equal(charges(), 1);
  assert.equal(flow.get(id).isPaid, true);

  const again = await flow.unlock(id);
  assert.equal(again.state.name, 'Unlocked');
  assert.equal(charges(), 1);
});

test('two submissions of one form store one order and send one email', async () => {
  const { flow, orders, notifier } = setup();
  const id = readySession(flow);
  await flow.analyze(id);
  flow.openLead(id, { type: 'bulk' });

  const outcomes = await Promise.allSettled([flow.submitLead(id, FIELDS), flow.submitLead(id, FIELDS)]);

  assert.equal(outcomes[0].status, 'fulfilled');
  const second = rejectionOf(outcomes[1]);
  assert.ok(second instanceof ConflictError);
  assert.equal(second.status, 409);
  assert.equal(orders.listOrders().length, 1);
  assert.deepEqual(notifier.sent, ['asha@example.com']);
  assert.equal(flow.get(id).lead?.status, 'submitted');
});

test('a storage failure keeps the form open and sends no email', async () => {
  const { flow, notifier } = setup({ orders: new FailingOrderStore(':memory:') });
  const id = readySession(flow);
  await flow.analyze(id);
  flow.openLead(id, { type: 'bulk' });

  await assert.rejects(
    flow.submitLead(id, FIELDS),
    (error: unknown) => error instanceof StorageError && error.status === 500 && error.message === 'Failed to save order',
  );

  assert.equal(flow.get(id).lead?.status, 'open');
  assert.deepEqual(notifier.sent, []);

  // The form can be submitted again once the error is seen.
  await assert.rejects(flow.submitLead(id, FIELDS), StorageError);
});
