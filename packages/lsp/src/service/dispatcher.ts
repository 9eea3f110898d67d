import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

import type { AdapterSettings } from '../config.js';
import type {
  BackendResult,
  CapabilityKind,
  CompletionItem,
  DidChangeTextDocumentParams,
  DidCloseTextDocumentParams,
  DidOpenTextDocumentParams,
  DocumentSnapshot,
  DocumentUri,
  Hover,
  InlayHint,
  InlayHintParams,
  Location,
  TextDocumentPositionParams,
} from '../types.js';
import {
  createBackendRequest,
  type BackendInvoker,
} from './backend-invoker.js';
import type { DiagnosticsPublisher } from './diagnostics-publisher.js';
import type { DocumentStore } from './document-store.js';
import {
  cancelledError,
  toResponseError,
  type InvokeError,
} from './errors.js';
import { getLogger } from './logger.js';
import type { TextSource } from './position-codec.js';
import {
  parseCompletionOutput,
  parseDefinitionOutput,
  parseHoverOutput,
  toLocation,
} from './response-parser.js';
import type { SettingsSource } from './settings-provider.js';

export type DocumentActivity =
  | { state: 'idle' }
  | { state: 'processing'; inFlight: number };

export interface DispatcherOptions {
  store: DocumentStore;
  invoker: BackendInvoker;
  settings: SettingsSource;
  publisher: DiagnosticsPublisher;
  /** Working directory relative definition paths resolve against. */
  cwd?: string;
  readTextFile?: (path: string) => Promise<string>;
}

/**
 * What a capability does when the backend fails: `empty` answers with "no
 * result", `error` fails the request.
 */
const FAILURE_POLICY: Record<
  Exclude<CapabilityKind, 'check'>,
  'empty' | 'error'
> = {
  hover: 'empty',
  completion: 'empty',
  definition: 'error',
};

const logger = getLogger('dispatcher');

/**
 * Turns decoded RPC calls into backend invocations. Every request works on
 * the snapshot taken when it was admitted, so document notifications that
 * arrive while it runs cannot change what it sees.
 */
export class RequestDispatcher {
  private readonly inFlight = new Map<DocumentUri, number>();
  private readonly cwd: string;
  private readonly readTextFile: (path: string) => Promise<string>;

  public constructor(private readonly options: DispatcherOptions) {
    this.cwd = options.cwd ?? process.cwd();
    this.readTextFile =
      options.readTextFile ?? (async (path) => await readFile(path, 'utf8'));
  }

  public activity(uri: DocumentUri): DocumentActivity {
    const count = this.inFlight.get(uri) ?? 0;
    return count > 0
      ? { state: 'processing', inFlight: count }
      : { state: 'idle' };
  }

  /** Opens the document, then publishes its first diagnostics. */
  public async didOpen(params: DidOpenTextDocumentParams): Promise<void> {
    const { uri, text, version, languageId } = params.textDocument;
    this.options.store.open(uri, text, version, languageId);
    await this.options.publisher.refresh(uri);
  }

  public async didChange(params: DidChangeTextDocumentParams): Promise<void> {
    const { uri, version } = params.textDocument;
    this.options.store.applyChange(uri, version, params.contentChanges);
    await this.options.publisher.documentChanged(uri);
  }

  public didClose(params: DidCloseTextDocumentParams): void {
    const { uri } = params.textDocument;
    this.options.store.close(uri);
    this.options.publisher.documentClosed(uri);
  }

  public async hover(
    params: TextDocumentPositionParams,
    signal?: AbortSignal,
  ): Promise<Hover | null> {
    return await this.run<Hover | null>(
      'hover',
      params,
      signal,
      null,
      (result, uri, snapshot, settings) => {
        const report = parseHoverOutput(
          result.stdout,
          settings.output,
          snapshot,
          settings.position,
        );
        for (const bad of report.malformed) {
          logger.debug(() => `Skipped hover for ${uri}: ${bad.reason}`);
        }
        return report.values[0] ?? null;
      },
    );
  }

  public async completion(
    params: TextDocumentPositionParams,
    signal?: AbortSignal,
  ): Promise<CompletionItem[]> {
    return await this.run<CompletionItem[]>(
      'completion',
      params,
      signal,
      [],
      (result, uri, _snapshot, settings) => {
        const report = parseCompletionOutput(result.stdout, settings.output);
        for (const bad of report.malformed) {
          logger.debug(() => `Skipped completion for ${uri}: ${bad.reason}`);
        }
        return report.values;
      },
    );
  }

  public async definition(
    params: TextDocumentPositionParams,
    signal?: AbortSignal,
  ): Promise<Location[] | null> {
    return await this.run<Location[] | null>(
      'definition',
      params,
      signal,
      null,
      async (result, _uri, snapshot, settings) => {
        const report = parseDefinitionOutput(
          result.stdout,
          settings.output,
          settings.position,
          this.cwd,
        );
        for (const bad of report.malformed) {
          logger.debug(() => `Skipped definition record: ${bad.reason}`);
        }
        if (report.values.length === 0) {
          return null;
        }

        const locations = await Promise.all(
          report.values.map(async (target) => {
            const text = await this.textFor(target.uri, snapshot);
            if (!text) {
              logger.error(`Definition target ${target.uri} cannot be read`);
              return [];
            }
            return [toLocation(target, text, settings.position)];
          }),
        );
        const found = locations.flat();
        return found.length > 0 ? found : null;
      },
    );
  }

  public inlayHints(params: InlayHintParams): InlayHint[] {
    try {
      this.options.store.snapshot(params.textDocument.uri);
    } catch (error) {
      throw toResponseError(error);
    }
    return this.options.publisher.inlayHints(
      params.textDocument.uri,
      params.range,
    );
  }

  private async run<T>(
    kind: Exclude<CapabilityKind, 'check'>,
    params: TextDocumentPositionParams,
    signal: AbortSignal | undefined,
    empty: T,
    parse: (
      result: BackendResult,
      uri: DocumentUri,
      snapshot: DocumentSnapshot,
      settings: AdapterSettings,
    ) => T | Promise<T>,
  ): Promise<T> {
    const uri = params.textDocument.uri;
    const snapshot = this.admit(uri);

    try {
      const settings = await this.options.settings.forDocument(uri);
      if (signal?.aborted) {
        throw cancelledError();
      }

      const request = createBackendRequest(
        kind,
        snapshot,
        settings,
        params.position,
      );
      const outcome = await this.options.invoker.invoke(request, {
        timeoutMs: settings.maxInvocationTimeMs,
        ...(signal ? { signal } : {}),
      });

      if (signal?.aborted) {
        throw cancelledError();
      }
      if (!outcome.ok) {
        return this.onFailure(kind, outcome.error, empty);
      }

      logger.debug(
        () =>
          `${kind} ${uri}@${snapshot.version} took ${outcome.result.elapsedMs}ms`,
      );
      return await parse(outcome.result, uri, snapshot, settings);
    } catch (error) {
      throw toResponseError(error);
    } finally {
      this.release(uri);
    }
  }

  private onFailure<T>(
    kind: Exclude<CapabilityKind, 'check'>,
    error: InvokeError,
    empty: T,
  ): T {
    if (error.kind === 'SpawnFailed' || error.kind === 'Cancelled') {
      throw error;
    }
    if (FAILURE_POLICY[kind] === 'error') {
      throw error;
    }
    logger.warn(`${kind} answered empty: ${error.message}`);
    if (error.stderr.length > 0) {
      logger.debug(() => `${error.commandLine} stderr: ${error.stderr}`);
    }
    return empty;
  }

  /** Takes the request's snapshot and counts it as in flight. */
  private admit(uri: DocumentUri): DocumentSnapshot {
    let snapshot: DocumentSnapshot;
    try {
      snapshot = this.options.store.snapshot(uri);
    } catch (error) {
      throw toResponseError(error);
    }
    this.inFlight.set(uri, (this.inFlight.get(uri) ?? 0) + 1);
    return snapshot;
  }

  private release(uri: DocumentUri): void {
    const remaining = (this.inFlight.get(uri) ?? 1) - 1;
    if (remaining > 0) {
      this.inFlight.set(uri, remaining);
    } else {
      this.inFlight.delete(uri);
    }
  }

  private async textFor(
    uri: DocumentUri,
    requestSnapshot: DocumentSnapshot,
  ): Promise<TextSource | undefined> {
    if (uri === requestSnapshot.uri) {
      return requestSnapshot;
    }
    if (this.options.store.has(uri)) {
      return this.options.store.snapshot(uri);
    }
    if (!uri.startsWith('file://')) {
      return undefined;
    }
    try {
      return { text: await this.readTextFile(fileURLToPath(uri)) };
    } catch (error) {
      logger.debug(
        () => `Cannot read definition target ${uri}: ${String(error)}`,
      );
      return undefined;
    }
  }
}
