import { describe, it, expect, vi, beforeEach } from 'vitest';
import { buildExtractionPrompt, extractEmails, type ExtractionOptions } from '../../utils/emailExtractor';
import { AuthenticationError, SchemaViolationError, UpstreamError } from '../../utils/errors';
import { emailFieldNames, type EmailSnapshot } from '../../types/email';
import { complete, createScriptedModel, deferred, partial, text } from '../fakeModel';
import { twoEmailText } from '../exampleEmails';

const collect = async (snapshots: AsyncIterable<EmailSnapshot>) => {
  const out: EmailSnapshot[] = [];
  for await (const snapshot of snapshots) {
    out.push(snapshot);
  }
  return out;
};

describe('extractEmails', () => {
  beforeEach(() => {
    vi.spyOn(console, 'info').mockImplementation(() => {});
  });

  const options = (overrides: Partial<ExtractionOptions> = {}): ExtractionOptions => ({
    apiKey: 'test-key',
    modelId: 'test-model',
    timeoutMs: 1000,
    ...overrides,
  });

  it('fails with AuthenticationError before calling the model when no key is set', async () => {
    const { factory } = createScriptedModel([complete([])]);

    await expect(collect(extractEmails(twoEmailText, options({ apiKey: undefined, createModel: factory })))).rejects.toBeInstanceOf(
      AuthenticationError,
    );
    await expect(collect(extractEmails(twoEmailText, options({ apiKey: '   ', createModel: factory })))).rejects.toBeInstanceOf(
      AuthenticationError,
    );
    expect(factory).not.toHaveBeenCalled();
  });

  it('yields a single empty terminal snapshot for blank input without calling the model', async () => {
    const { factory } = createScriptedModel([complete([])]);

    const snapshots = await collect(extractEmails(' \n\t ', options({ createModel: factory })));

    expect(snapshots).toEqual([{ emails: [], rawText: '', done: true }]);
    expect(factory).not.toHaveBeenCalled();
  });

  it('passes the key, model id and prompt to the model', async () => {
    const { factory, prompts } = createScriptedModel([complete([])]);

    await collect(extractEmails(twoEmailText, options({ apiKey: '  test-key  ', createModel: factory })));

    expect(factory).toHaveBeenCalledWith('test-key', 'test-model');
    expect(prompts).toEqual([buildExtractionPrompt(twoEmailText)]);
  });

  it('extracts two emails from two blocks of text', async () => {
    const { factory } = createScriptedModel([
      partial([{ sender: 'alice@x.com' }]),
      partial([{ sender: 'alice@x.com', subject: 'Hi' }]),
      partial([{ sender: 'alice@x.com', subject: 'Hi' }, { sender: 'bob@y.com' }]),
      partial([{ sender: 'alice@x.com', subject: 'Hi' }, { sender: 'bob@y.com', subject: 'Re: Hi' }]),
      complete([{ sender: 'alice@x.com', subject: 'Hi' }, { sender: 'bob@y.com', subject: 'Re: Hi' }]),
    ]);

    const snapshots = await collect(extractEmails(twoEmailText, options({ createModel: factory })));
    const terminal = snapshots[snapshots.length - 1];

    expect(snapshots.map((s) => s.done)).toEqual([false, false, false, false, true]);
    expect(terminal.emails).toHaveLength(2);
    expect(terminal.emails[0].sender).toContain('alice@x.com');
    expect(terminal.emails[1].subject).toContain('Re: Hi');
  });

  it('never drops a populated field or moves a record between snapshots', async () => {
    const { factory } = createScriptedModel([
      partial([{ sender: 'alice@x.com', subject: 'Hi' }]),
      // the model re-sends the first record without its subject
      partial([{ sender: 'alice@x.com' }, { sender: 'bob@y.com' }]),
      partial([{ body: 'Hello' }, { sender: 'bob@y.com', subject: 'Re: Hi' }]),
      complete([{ sender: 'alice@x.com', subject: 'Hi', body: 'Hello' }, { sender: 'bob@y.com', subject: 'Re: Hi' }]),
    ]);

    const snapshots = await collect(extractEmails(twoEmailText, options({ createModel: factory })));

    expect(snapshots[1].emails[0]).toEqual({ sender: 'alice@x.com', subject: 'Hi' });
    expect(snapshots[2].emails[0]).toEqual({ sender: 'alice@x.com', subject: 'Hi', body: 'Hello' });

    for (let i = 1; i < snapshots.length; i++) {
      const before = snapshots[i - 1].emails;
      const after = snapshots[i].emails;
      expect(after.length).toBeGreaterThanOrEqual(before.length);
      before.forEach((record, index) => {
        for (const field of emailFieldNames) {
          if (record[field] !== undefined) {
            expect(after[index][field]).toBe(record[field]);
          }
        }
      });
    }
  });

  it('lets a later value for the same field win', async () => {
    const { factory } = createScriptedModel([
      partial([{ subject: 'Re' }]),
      partial([{ subject: 'Re: Hi' }]),
      complete([{ subject: 'Re: Hi' }]),
    ]);

    const snapshots = await collect(extractEmails(twoEmailText, options({ createModel: factory })));

    expect(snapshots.map((s) => s.emails[0].subject)).toEqual(['Re', 'Re: Hi', 'Re: Hi']);
  });

  it('does not repeat a snapshot when the model object did not change', async () => {
    const { factory } = createScriptedModel([
      partial([{ sender: 'alice@x.com' }]),
      partial([{ sender: 'alice@x.com' }]),
      complete([{ sender: 'alice@x.com' }]),
    ]);

    const snapshots = await collect(extractEmails(twoEmailText, options({ createModel: factory })));

    expect(snapshots).toHaveLength(2);
  });

  it('accumulates the raw model text', async () => {
    const { factory } = createScriptedModel([
      text('{"emails":[{"sender":"alice@x.com"'),
      partial([{ sender: 'alice@x.com' }]),
      text('}]}'),
      complete([{ sender: 'alice@x.com' }]),
    ]);

    const snapshots = await collect(extractEmails(twoEmailText, options({ createModel: factory })));

    expect(snapshots[0].rawText).toBe('{"emails":[{"sender":"alice@x.com"');
    expect(snapshots[1].rawText).toBe('{"emails":[{"sender":"alice@x.com"}]}');
  });

  it('freezes every snapshot it yields', async () => {
    const { factory } = createScriptedModel([partial([{ sender: 'alice@x.com' }]), complete([{ sender: 'alice@x.com' }])]);

    const snapshots = await collect(extractEmails(twoEmailText, options({ createModel: factory })));
    const terminal = snapshots[1];

    expect(Object.isFrozen(terminal)).toBe(true);
    expect(Object.isFrozen(terminal.emails)).toBe(true);
    expect(Object.isFrozen(terminal.emails[0])).toBe(true);
  });

  it('fails with SchemaViolationError when a field has the wrong type', async () => {
    const { factory } = createScriptedModel([
      partial([{ sender: 'alice@x.com' }]),
      partial([{ sender: 'alice@x.com', subject: 42 }]),
      complete([]),
    ]);

    const iterator = extractEmails(twoEmailText, options({ createModel: factory }));

    const first = await iterator.next();
    expect(first.value).toEqual({ emails: [{ sender: 'alice@x.com' }], rawText: '', done: false });

    const failure = iterator.next();
    await expect(failure).rejects.toBeInstanceOf(SchemaViolationError);
    await expect(failure).rejects.toThrow('emails.0.subject: Expected string, received number');
  });

  it('fails with UpstreamError when the stream ends before completing', async () => {
    const { factory } = createScriptedModel([partial([{ sender: 'alice@x.com' }])]);

    await expect(collect(extractEmails(twoEmailText, options({ createModel: factory })))).rejects.toThrow(
      new UpstreamError('The model stream ended before the response was complete'),
    );
  });

  it('attaches the raw model text received before a failure to the error', async () => {
    const { factory } = createScriptedModel([
      text('{"emails":[{"sender":"alice@x.com"'),
      partial([{ sender: 'alice@x.com' }]),
      text(',"subject":"Hi"'),
      () => Promise.reject(new Error('socket hang up')),
    ]);

    await expect(collect(extractEmails(twoEmailText, options({ createModel: factory })))).rejects.toHaveProperty(
      'rawText',
      '{"emails":[{"sender":"alice@x.com","subject":"Hi"',
    );
  });

  it('wraps unexpected model failures in UpstreamError', async () => {
    const { factory } = createScriptedModel([() => Promise.reject(new Error('socket hang up'))]);

    const result = collect(extractEmails(twoEmailText, options({ createModel: factory })));

    await expect(result).rejects.toBeInstanceOf(UpstreamError);
    await expect(result).rejects.toThrow('socket hang up');
  });

  it('passes classified provider errors through unchanged', async () => {
    const rejected = new AuthenticationError('The model provider rejected the API key (HTTP 401)');
    const { factory } = createScriptedModel([() => Promise.reject(rejected)]);

    await expect(collect(extractEmails(twoEmailText, options({ createModel: factory })))).rejects.toBe(rejected);
  });

  it('maps a timeout to UpstreamError', async () => {
    const { factory } = createScriptedModel([() => new Promise<void>(() => {})]);

    const result = collect(extractEmails(twoEmailText, options({ timeoutMs: 20, createModel: factory })));

    await expect(result).rejects.toBeInstanceOf(UpstreamError);
    await expect(result).rejects.toThrow('The model did not finish within 20 ms');
  });

  it('stops with an AbortError when the caller cancels', async () => {
    const gate = deferred();
    const controller = new AbortController();
    const { factory } = createScriptedModel([partial([{ sender: 'alice@x.com' }]), () => gate.promise, complete([])]);

    const iterator = extractEmails(twoEmailText, options({ signal: controller.signal, createModel: factory }));
    await iterator.next();

    const pending = iterator.next();
    controller.abort();

    await expect(pending).rejects.toHaveProperty('name', 'AbortError');
  });
});

describe('buildExtractionPrompt', () => {
  it('states the task, embeds the schema and includes the text verbatim', () => {
    const prompt = buildExtractionPrompt('From: alice@x.com\n  Subject: Hi');

    expect(prompt.startsWith('Parse the following text into an array of email objects.')).toBe(true);
    expect(prompt).toContain('Return only valid JSON matching this schema:');
    expect(prompt).toContain('"sender"');
    expect(prompt.endsWith('Text to parse:\nFrom: alice@x.com\n  Subject: Hi')).toBe(true);
  });
});
