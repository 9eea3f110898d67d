import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import type { AdapterSettings } from '../src/config.js';
import {
  createDiagnosticsSchedule,
  DiagnosticsPublisher,
  type DiagnosticsSchedule,
} from '../src/service/diagnostics-publisher.js';
import { DocumentStore } from '../src/service/document-store.js';
import type { PublishDiagnosticsParams } from '../src/types.js';
import {
  deferred,
  failedResult,
  okResult,
  ScriptedInvoker,
} from './helpers/scripted-invoker.js';
import { lineSettings } from './helpers/settings.js';

const URI = 'file:///a.txt';
const CHECK_OUTPUT = 'error\t1\t4\t1\t5\tunknown variable\ninlay\t1\t5\t: int\n';

/** Runs scheduled work only when the test says so. */
class ManualSchedule implements DiagnosticsSchedule {
  public readonly pending = new Map<string, () => Promise<void>>();
  public cancelled: string[] = [];

  public schedule(
    uri: string,
    _policy: AdapterSettings['diagnostics'],
    run: () => Promise<void>,
  ): void {
    this.pending.set(uri, run);
  }

  public cancel(uri: string): void {
    this.cancelled.push(uri);
    this.pending.delete(uri);
  }

  public dispose(): void {
    this.pending.clear();
  }

  public async flush(uri: string): Promise<void> {
    const run = this.pending.get(uri);
    this.pending.delete(uri);
    await run?.();
  }
}

describe('DiagnosticsPublisher', () => {
  let store: DocumentStore;
  let invoker: ScriptedInvoker;
  let published: PublishDiagnosticsParams[];
  let schedule: ManualSchedule;
  let settings: AdapterSettings;
  let canPublish: boolean;
  let publisher: DiagnosticsPublisher;

  beforeEach(() => {
    store = new DocumentStore();
    store.open(URI, 'let x = 1\nprint x', 1, 'plaintext');
    invoker = new ScriptedInvoker(() => okResult(CHECK_OUTPUT));
    published = [];
    schedule = new ManualSchedule();
    settings = lineSettings();
    canPublish = true;
    publisher = new DiagnosticsPublisher({
      store,
      invoker,
      settings: { forDocument: async () => settings },
      publish: (params) => published.push(params),
      canPublish: () => canPublish,
      schedule,
    });
  });

  it('publishes the complete set for the checked version', async () => {
    await publisher.refresh(URI);

    expect(invoker.callsFor('check')[0]?.args).toEqual(['--ide-check']);
    expect(published).toEqual([
      {
        uri: URI,
        version: 1,
        diagnostics: [
          {
            range: {
              start: { line: 0, character: 4 },
              end: { line: 0, character: 5 },
            },
            severity: 1,
            message: 'unknown variable',
            source: 'nu',
          },
        ],
      },
    ]);
  });

  it('keeps the previous set when a check fails', async () => {
    await publisher.refresh(URI);
    invoker.respondWith(() => failedResult('NonZeroExit'));

    await publisher.refresh(URI);

    expect(published).toHaveLength(1);
    expect(publisher.current(URI)).toHaveLength(1);
  });

  it('keeps the previous set when the backend cannot be started', async () => {
    await publisher.refresh(URI);
    store.applyChange(URI, 2, [{ text: 'print y' }]);
    invoker.respondWith(() => failedResult('SpawnFailed', 'spawn nu ENOENT'));

    await publisher.refresh(URI);

    expect(invoker.calls).toHaveLength(2);
    expect(published.map((params) => params.version)).toEqual([1]);
    expect(publisher.current(URI)?.map((d) => d.message)).toEqual([
      'unknown variable',
    ]);
  });

  it('decodes JSON check records', async () => {
    settings = {
      ...settings,
      output: 'json',
      position: { ...settings.position, style: 'offset' },
    };
    invoker.respondWith(() =>
      okResult(
        [
          '{"type":"diagnostic","severity":"Warning","message":"unused","span":{"start":4,"end":5}}',
          'not json',
          '{"type":"hint","typename":"int","position":{"start":4,"end":5}}',
        ].join('\n'),
      ),
    );

    await publisher.refresh(URI);

    expect(published[0]?.diagnostics).toEqual([
      {
        range: {
          start: { line: 0, character: 4 },
          end: { line: 0, character: 5 },
        },
        severity: 2,
        message: 'unused',
        source: 'nu',
      },
    ]);
    expect(publisher.inlayHints(URI)).toEqual([
      { position: { line: 0, character: 5 }, label: ': int', kind: 1 },
    ]);
  });

  it('publishes an empty set when the backend reports nothing', async () => {
    invoker.respondWith(() => okResult(''));

    await publisher.refresh(URI);

    expect(published).toEqual([{ uri: URI, version: 1, diagnostics: [] }]);
  });

  it('does nothing when the client cannot receive diagnostics', async () => {
    canPublish = false;

    await publisher.refresh(URI);

    expect(invoker.calls).toHaveLength(0);
    expect(published).toEqual([]);
  });

  it('caps the number of problems', async () => {
    settings = { ...settings, maxNumberOfProblems: 2 };
    invoker.respondWith(() =>
      okResult(
        ['a', 'b', 'c']
          .map((message) => `warning\t1\t0\t1\t1\t${message}`)
          .join('\n'),
      ),
    );

    await publisher.refresh(URI);

    expect(published[0]?.diagnostics.map((d) => d.message)).toEqual(['a', 'b']);
  });

  it('names diagnostics after the executable', async () => {
    settings = { ...settings, executablePath: '/usr/local/bin/checker' };

    await publisher.refresh(URI);

    expect(published[0]?.diagnostics[0]?.source).toBe('checker');
  });

  it('checks on change through the schedule', async () => {
    store.applyChange(URI, 2, [{ text: 'print y' }]);
    await publisher.documentChanged(URI);

    expect(invoker.calls).toHaveLength(0);
    await schedule.flush(URI);

    expect(invoker.calls[0]?.request.snapshot.text).toBe('print y');
    expect(published[0]?.version).toBe(2);
  });

  it('serializes runs for one document', async () => {
    const gate = deferred<void>();
    const texts: string[] = [];
    invoker.respondWith(async (request) => {
      texts.push(request.snapshot.text);
      if (request.snapshot.version === 1) {
        await gate.promise;
      }
      return okResult(`warning\t1\t0\t1\t1\tv${request.snapshot.version}`);
    });

    const first = publisher.refresh(URI);
    await vi.waitFor(() => expect(texts).toHaveLength(1));
    store.applyChange(URI, 2, [{ text: 'changed' }]);
    const second = publisher.refresh(URI);
    gate.resolve();
    await Promise.all([first, second]);

    expect(texts).toEqual(['let x = 1\nprint x', 'changed']);
    expect(published.map((params) => params.version)).toEqual([1, 2]);
  });

  it('does not publish for a document closed while its check ran', async () => {
    const gate = deferred<void>();
    invoker.respondWith(async () => {
      await gate.promise;
      return okResult(CHECK_OUTPUT);
    });

    const run = publisher.refresh(URI);
    await vi.waitFor(() => expect(invoker.calls).toHaveLength(1));
    store.close(URI);
    publisher.documentClosed(URI);
    gate.resolve();
    await run;

    expect(published).toEqual([]);
  });

  it('publishes the reopened document, not a check of its previous open', async () => {
    store.close(URI);
    store.open(URI, 'let x = 1\nprint x', 7, 'plaintext');
    const gate = deferred<void>();
    invoker.respondWith(async (request) => {
      if (request.snapshot.version === 7) {
        await gate.promise;
        return okResult(CHECK_OUTPUT);
      }
      return okResult('');
    });

    const stale = publisher.refresh(URI);
    await vi.waitFor(() => expect(invoker.calls).toHaveLength(1));
    store.close(URI);
    publisher.documentClosed(URI);
    store.open(URI, 'print 1', 1, 'plaintext');
    const reopened = publisher.refresh(URI);
    gate.resolve();
    await Promise.all([stale, reopened]);

    expect(
      published.map((params) => [params.version, params.diagnostics.length]),
    ).toEqual([[1, 0]]);
    expect(publisher.current(URI)).toEqual([]);
    expect(publisher.inlayHints(URI)).toEqual([]);
  });

  it('clears diagnostics on close', async () => {
    await publisher.refresh(URI);
    store.close(URI);

    publisher.documentClosed(URI);

    expect(published.at(-1)).toEqual({ uri: URI, diagnostics: [] });
    expect(publisher.current(URI)).toBeUndefined();
    expect(schedule.cancelled).toContain(URI);
  });

  it('serves inlay hints from the last check', async () => {
    await publisher.refresh(URI);

    expect(publisher.inlayHints(URI)).toEqual([
      { position: { line: 0, character: 5 }, label: ': int', kind: 1 },
    ]);
    expect(
      publisher.inlayHints(URI, {
        start: { line: 1, character: 0 },
        end: { line: 1, character: 7 },
      }),
    ).toEqual([]);
  });

  it('drops inlay hints when they are disabled', async () => {
    settings = { ...settings, hints: { showInferredTypes: false } };

    await publisher.refresh(URI);

    expect(publisher.inlayHints(URI)).toEqual([]);
  });
});

describe('createDiagnosticsSchedule', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('debounces bursts of changes into one run', () => {
    const schedule = createDiagnosticsSchedule();
    const run = vi.fn(async () => {});
    const policy = { onChange: 'debounce' as const, delayMs: 250 };

    schedule.schedule(URI, policy, run);
    vi.advanceTimersByTime(200);
    schedule.schedule(URI, policy, run);
    vi.advanceTimersByTime(200);
    expect(run).not.toHaveBeenCalled();

    vi.advanceTimersByTime(50);
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('runs every change when eager', () => {
    const schedule = createDiagnosticsSchedule();
    const run = vi.fn(async () => {});
    const policy = { onChange: 'eager' as const, delayMs: 250 };

    schedule.schedule(URI, policy, run);
    schedule.schedule(URI, policy, run);

    expect(run).toHaveBeenCalledTimes(2);
  });

  it('drops changes inside the throttle window', () => {
    let now = 1_000;
    const schedule = createDiagnosticsSchedule(() => now);
    const run = vi.fn(async () => {});
    const policy = { onChange: 'throttle' as const, delayMs: 500 };

    schedule.schedule(URI, policy, run);
    now += 100;
    schedule.schedule(URI, policy, run);
    now += 500;
    schedule.schedule(URI, policy, run);

    expect(run).toHaveBeenCalledTimes(2);
  });

  it('never runs when off, and cancel drops a pending run', () => {
    const schedule = createDiagnosticsSchedule();
    const run = vi.fn(async () => {});

    schedule.schedule(URI, { onChange: 'off', delayMs: 0 }, run);
    schedule.schedule(URI, { onChange: 'debounce', delayMs: 100 }, run);
    schedule.cancel(URI);
    vi.advanceTimersByTime(1_000);

    expect(run).not.toHaveBeenCalled();
  });
});
