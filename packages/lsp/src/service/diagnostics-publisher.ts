import { basename } from 'node:path';

import type { DiagnosticsPolicy } from '../config.js';
import type {
  Diagnostic,
  DocumentSnapshot,
  DocumentUri,
  InlayHint,
  PublishDiagnosticsParams,
  Range,
} from '../types.js';
import {
  createBackendRequest,
  type BackendInvoker,
} from './backend-invoker.js';
import type { DocumentStore } from './document-store.js';
import { isDocumentStoreError } from './errors.js';
import { KeyedQueue } from './keyed-queue.js';
import { getLogger } from './logger.js';
import { parseCheckOutput } from './response-parser.js';
import type { SettingsSource } from './settings-provider.js';

/**
 * Decides when a change-triggered diagnostics run happens. `run` never
 * rejects.
 */
export interface DiagnosticsSchedule {
  schedule(
    uri: DocumentUri,
    policy: DiagnosticsPolicy,
    run: () => Promise<void>,
  ): void;
  cancel(uri: DocumentUri): void;
  dispose(): void;
}

/**
 * Timer-backed schedule: `eager` runs every change, `debounce` runs once the
 * document has been quiet for `delayMs`, `throttle` drops changes that arrive
 * within `delayMs` of the previous run, `off` never runs.
 */
export function createDiagnosticsSchedule(
  now: () => number = Date.now,
): DiagnosticsSchedule {
  const timers = new Map<DocumentUri, ReturnType<typeof setTimeout>>();
  const lastRun = new Map<DocumentUri, number>();

  const cancel = (uri: DocumentUri): void => {
    const timer = timers.get(uri);
    if (timer !== undefined) {
      clearTimeout(timer);
      timers.delete(uri);
    }
  };

  return {
    schedule(uri, policy, run) {
      switch (policy.onChange) {
        case 'off':
          return;
        case 'eager':
          void run();
          return;
        case 'throttle': {
          const previous = lastRun.get(uri);
          if (previous !== undefined && now() - previous < policy.delayMs) {
            return;
          }
          lastRun.set(uri, now());
          void run();
          return;
        }
        case 'debounce':
          cancel(uri);
          timers.set(
            uri,
            setTimeout(() => {
              timers.delete(uri);
              void run();
            }, policy.delayMs),
          );
          return;
      }
    },
    cancel(uri) {
      cancel(uri);
      lastRun.delete(uri);
    },
    dispose() {
      for (const uri of [...timers.keys()]) {
        cancel(uri);
      }
      lastRun.clear();
    },
  };
}

export interface DiagnosticsPublisherOptions {
  store: DocumentStore;
  invoker: BackendInvoker;
  settings: SettingsSource;
  publish: (params: PublishDiagnosticsParams) => void;
  /** False when the client never advertised publishDiagnostics. */
  canPublish?: () => boolean;
  schedule?: DiagnosticsSchedule;
}

interface PublishedState {
  generation: number;
  version: number;
  diagnostics: Diagnostic[];
}

const logger = getLogger('diagnostics');

const contains = (range: Range, position: Range['start']): boolean => {
  const afterStart =
    position.line > range.start.line ||
    (position.line === range.start.line &&
      position.character >= range.start.character);
  const beforeEnd =
    position.line < range.end.line ||
    (position.line === range.end.line &&
      position.character <= range.end.character);
  return afterStart && beforeEnd;
};

/**
 * Runs the check capability and publishes the complete diagnostic set for a
 * document. A failed run leaves the last published set in place.
 */
export class DiagnosticsPublisher {
  private readonly published = new Map<DocumentUri, PublishedState>();
  private readonly hintsByUri = new Map<DocumentUri, InlayHint[]>();
  private readonly runs = new KeyedQueue<DocumentUri>();
  private readonly schedule: DiagnosticsSchedule;

  public constructor(private readonly options: DiagnosticsPublisherOptions) {
    this.schedule = options.schedule ?? createDiagnosticsSchedule();
  }

  /** Checks the document now; resolves once the run is over. */
  public async refresh(uri: DocumentUri): Promise<void> {
    this.schedule.cancel(uri);
    await this.runs.run(uri, async () => {
      try {
        await this.check(uri);
      } catch (error) {
        logger.error(`Diagnostics for ${uri} failed: ${String(error)}`);
      }
    });
  }

  public async refreshAll(): Promise<void> {
    await Promise.all(
      this.options.store.uris().map(async (uri) => await this.refresh(uri)),
    );
  }

  public async documentChanged(uri: DocumentUri): Promise<void> {
    const settings = await this.options.settings.forDocument(uri);
    this.schedule.schedule(uri, settings.diagnostics, async () => {
      await this.refresh(uri);
    });
  }

  public documentClosed(uri: DocumentUri): void {
    this.schedule.cancel(uri);
    this.hintsByUri.delete(uri);
    const hadDiagnostics = this.published.delete(uri);
    if (hadDiagnostics && this.canPublish()) {
      this.options.publish({ uri, diagnostics: [] });
    }
  }

  public current(uri: DocumentUri): Diagnostic[] | undefined {
    return this.published.get(uri)?.diagnostics;
  }

  public inlayHints(uri: DocumentUri, range?: Range): InlayHint[] {
    const hints = this.hintsByUri.get(uri) ?? [];
    return range
      ? hints.filter((hint) => contains(range, hint.position))
      : hints;
  }

  public dispose(): void {
    this.schedule.dispose();
  }

  private canPublish(): boolean {
    return this.options.canPublish?.() ?? true;
  }

  private async check(uri: DocumentUri): Promise<void> {
    if (!this.canPublish()) {
      logger.debug('client did not report diagnostic capability');
      return;
    }

    const { store, invoker } = this.options;
    let snapshot: DocumentSnapshot;
    try {
      snapshot = store.snapshot(uri);
    } catch (error) {
      if (isDocumentStoreError(error)) {
        return;
      }
      throw error;
    }

    const settings = await this.options.settings.forDocument(uri);
    const request = createBackendRequest('check', snapshot, settings);
    const outcome = await invoker.invoke(request, {
      timeoutMs: settings.maxInvocationTimeMs,
    });

    if (!outcome.ok) {
      logger.warn(
        `Keeping previous diagnostics for ${uri}: ${outcome.error.message}`,
      );
      return;
    }

    // A close, or a close and reopen, during the run retires its result.
    if (
      !store.has(uri) ||
      store.snapshot(uri).generation !== snapshot.generation
    ) {
      logger.debug(() => `Discarding check of closed ${uri}@${snapshot.version}`);
      return;
    }
    const previous = this.published.get(uri);
    if (
      previous &&
      previous.generation === snapshot.generation &&
      previous.version > snapshot.version
    ) {
      logger.debug(() => `Discarding check of ${uri}@${snapshot.version}`);
      return;
    }

    const parsed = parseCheckOutput(
      outcome.result.stdout,
      settings.output,
      snapshot,
      settings.position,
      basename(settings.executablePath),
    );
    for (const bad of parsed.malformed) {
      logger.debug(() => `Skipped check line '${bad.raw}': ${bad.reason}`);
    }

    const diagnostics = parsed.diagnostics.slice(
      0,
      settings.maxNumberOfProblems,
    );
    this.published.set(uri, {
      generation: snapshot.generation,
      version: snapshot.version,
      diagnostics,
    });
    this.hintsByUri.set(
      uri,
      settings.hints.showInferredTypes ? parsed.hints : [],
    );
    this.options.publish({ uri, version: snapshot.version, diagnostics });
  }
}
