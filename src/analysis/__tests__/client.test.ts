import test from 'node:test';
import assert from 'node:assert/strict';

import { AnalysisClient, isRateLimitError } from '../client';
import { GenerativeFileService, RemoteFile, RemoteFileState } from '../fileService';
import { STAGE_FOCUS } from '../prompts';

const REPORT = JSON.stringify({
  property_summary: 'Survey No. 88, Nashik',
  current_owner: 'M. Kulkarni',
  risk_score: 'Medium',
  analysis_summary: 'One mutation entry is not backed by a deed.',
  missing_docs_list: [
    { year: '2009', doc_type: 'Release Deed', doc_no: '1123/2009', reason: 'Cited in schedule', risk_explained: 'Co-owner claim open' },
  ],
});

type Step = string | Error;

class FakeFileService implements GenerativeFileService {
  uploads: string[] = [];
  gets = 0;
  prompts: string[] = [];

  constructor(
    private options: {
      states?: RemoteFileState[];
      uploadError?: Error;
      responses?: Step[];
    } = {},
  ) {}

  private file(state: RemoteFileState): RemoteFile {
    return { name: 'files/deed-1', uri: 'https://files.test/deed-1', mimeType: 'application/pdf', state };
  }

  async upload(filePath: string): Promise<RemoteFile> {
    this.uploads.push(filePath);
    if (this.options.uploadError) throw this.options.uploadError;
    return this.file(this.options.states?.[0] ?? 'ACTIVE');
  }

  async get(): Promise<RemoteFile> {
    this.gets += 1;
    const states = this.options.states ?? ['ACTIVE'];
    return this.file(states[Math.min(this.gets, states.length - 1)]);
  }

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const responses = this.options.responses ?? [REPORT];
    const next = responses[Math.min(this.prompts.length - 1, responses.length - 1)];
    if (next instanceof Error) throw next;
    return next;
  }
}

function rateLimited(): Error {
  return Object.assign(new Error('[429 Too Many Requests] quota exceeded'), { status: 429 });
}

function makeClient(service: FakeFileService, overrides: { maxWaitMs?: number } = {}) {
  const sleeps: number[] = [];
  const keys: string[] = [];
  const client = new AnalysisClient(
    (apiKey) => {
      keys.push(apiKey);
      return service;
    },
    {
      pollIntervalMs: 1000,
      maxWaitMs: overrides.maxWaitMs ?? 120_000,
      rateLimitRetryMs: 10_000,
      sleep: async (ms) => {
        sleeps.push(ms);
      },
    },
  );
  return { client, sleeps, keys };
}

const request = { filePath: '/tmp/deed.pdf', stage: 'TokenPayment' as const, apiKey: 'test-key' };

test('analyze: uploads, prompts with the stage focus and parses the report', async () => {
  const service = new FakeFileService();
  const { client, keys, sleeps } = makeClient(service);

  const result = await client.analyze(request);

  assert.ok(result.ok);
  assert.equal(result.value.risk_score, 'Medium');
  assert.equal(result.value.missing_docs[0].doc_no, '1123/2009');
  assert.deepEqual(keys, ['test-key']);
  assert.deepEqual(service.uploads, ['/tmp/deed.pdf']);
  assert.equal(service.prompts.length, 1);
  assert.ok(service.prompts[0].includes(STAGE_FOCUS.TokenPayment));
  assert.deepEqual(sleeps, []);
});

test('analyze: polls once a second until the file is active', async () => {
  const service = new FakeFileService({ states: ['PROCESSING', 'PROCESSING', 'ACTIVE'] });
  const { client, sleeps } = makeClient(service);

  const result = await client.analyze(request);

  assert.ok(result.ok);
  assert.equal(service.gets, 2);
  assert.deepEqual(sleeps, [1000, 1000]);
});

test('analyze: gives up with TimeoutExceeded once the wait budget is spent', async () => {
  const service = new FakeFileService({ states: ['PROCESSING'] });
  const { client, sleeps } = makeClient(service, { maxWaitMs: 3000 });

  const result = await client.analyze(request);

  assert.deepEqual(result, {
    ok: false,
    error: { kind: 'TimeoutExceeded', message: 'File was still processing after 3000ms', waitedMs: 3000 },
  });
  assert.deepEqual(sleeps, [1000, 1000, 1000]);
  assert.equal(service.prompts.length, 0);
});

test('analyze: a file the service failed to process is UploadFailed', async () => {
  const service = new FakeFileService({ states: ['PROCESSING', 'FAILED'] });
  const { client } = makeClient(service);

  const result = await client.analyze(request);

  assert.deepEqual(result, {
    ok: false,
    error: { kind: 'UploadFailed', message: 'File upload failed: AI service could not process files/deed-1' },
  });
});

test('analyze: upload errors are UploadFailed', async () => {
  const service = new FakeFileService({ uploadError: new Error('API key not valid') });
  const { client } = makeClient(service);

  const result = await client.analyze(request);

  assert.deepEqual(result, {
    ok: false,
    error: { kind: 'UploadFailed', message: 'File upload failed: API key not valid' },
  });
});

test('analyze: a rate-limited request is retried once after the delay', async () => {
  const service = new FakeFileService({ responses: [rateLimited(), REPORT] });
  const { client, sleeps } = makeClient(service);

  const result = await client.analyze(request);

  assert.ok(result.ok);
  assert.equal(service.prompts.length, 2);
  assert.deepEqual(sleeps, [10_000]);
});

test('analyze: still rate limited after the retry is RateLimited', async () => {
  const service = new FakeFileService({ responses: [rateLimited(), rateLimited()] });
  const { client, sleeps } = makeClient(service);

  const result = await client.analyze(request);

  assert.deepEqual(result, {
    ok: false,
    error: { kind: 'RateLimited', message: 'AI quota exhausted: [429 Too Many Requests] quota exceeded' },
  });
  assert.equal(service.prompts.length, 2);
  assert.deepEqual(sleeps, [10_000]);
});

test('analyze: other generation errors are Other and not retried', async () => {
  const service = new FakeFileService({ responses: [new Error('socket hang up')] });
  const { client, sleeps } = makeClient(service);

  const result = await client.analyze(request);

  assert.deepEqual(result, { ok: false, error: { kind: 'Other', message: 'AI processing failed: socket hang up' } });
  assert.equal(service.prompts.length, 1);
  assert.deepEqual(sleeps, []);
});

test('analyze: unparseable output is MalformedResponse with the raw text', async () => {
  const raw = '```json\n{"property_summary": "Plot 7", \n```';
  const service = new FakeFileService({ responses: [raw] });
  const { client } = makeClient(service);

  const result = await client.analyze(request);

  assert.equal(result.ok, false);
  if (result.ok) return;
  assert.equal(result.error.kind, 'MalformedResponse');
  assert.ok(result.error.kind === 'MalformedResponse' && result.error.rawText === raw);
});

test('analyze: a service that cannot be constructed is Other', async () => {
  const client = new AnalysisClient(
    () => {
      throw new Error('apiKey must be set');
    },
    { pollIntervalMs: 1, maxWaitMs: 1, rateLimitRetryMs: 0 },
  );

  const result = await client.analyze(request);

  assert.deepEqual(result, { ok: false, error: { kind: 'Other', message: 'apiKey must be set' } });
});

test('isRateLimitError recognises status codes and quota messages', () => {
  assert.equal(isRateLimitError(rateLimited()), true);
  assert.equal(isRateLimitError({ code: 429 }), true);
  assert.equal(isRateLimitError(new Error('RESOURCE_EXHAUSTED: daily limit')), true);
  assert.equal(isRateLimitError(new Error('permission denied')), false);
  assert.equal(isRateLimitError('429'), false);
});
