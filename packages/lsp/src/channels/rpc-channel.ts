import {
  ErrorCodes,
  NotificationType,
  NotificationType0,
  RequestType,
  RequestType0,
  ResponseError,
  type CancellationToken,
  type MessageConnection,
} from 'vscode-jsonrpc';

import {
  defaultSettings,
  extractSection,
  type AdapterSettings,
} from '../config.js';
import type { BackendInvoker } from '../service/backend-invoker.js';
import {
  DiagnosticsPublisher,
  type DiagnosticsSchedule,
} from '../service/diagnostics-publisher.js';
import { RequestDispatcher } from '../service/dispatcher.js';
import { DocumentStore } from '../service/document-store.js';
import { isDocumentStoreError } from '../service/errors.js';
import { getLogger, Logger, type LogLevel } from '../service/logger.js';
import { SettingsProvider } from '../service/settings-provider.js';
import type {
  CompletionItem,
  DidChangeTextDocumentParams,
  DidCloseTextDocumentParams,
  DidOpenTextDocumentParams,
  DocumentUri,
  Hover,
  InlayHint,
  InlayHintParams,
  Location,
  PublishDiagnosticsParams,
  TextDocumentPositionParams,
} from '../types.js';

export const SERVER_INFO = { name: 'clibridge-lsp', version: '0.1.0' } as const;

type ClientCapabilities = {
  workspace?: {
    configuration?: boolean;
    didChangeConfiguration?: { dynamicRegistration?: boolean };
  };
  textDocument?: {
    publishDiagnostics?: unknown;
  };
};

export type InitializeParams = {
  processId?: number | null;
  capabilities?: ClientCapabilities;
  initializationOptions?: unknown;
};

export type InitializeResult = {
  capabilities: Record<string, unknown>;
  serverInfo: { name: string; version: string };
};

type ConfigurationParams = {
  items: Array<{ scopeUri?: DocumentUri; section?: string }>;
};

type RegistrationParams = {
  registrations: Array<{ id: string; method: string }>;
};

type WorkspaceFoldersChangeEvent = {
  event: {
    added: Array<{ uri: string; name: string }>;
    removed: Array<{ uri: string; name: string }>;
  };
};

const MessageType = { Error: 1, Warning: 2, Info: 3, Log: 4 } as const;

type MessageParams = { type: number; message: string };

const InitializeRequest = new RequestType<
  InitializeParams,
  InitializeResult,
  void
>('initialize');
const ShutdownRequest = new RequestType0<null, void>('shutdown');
const HoverRequest = new RequestType<
  TextDocumentPositionParams,
  Hover | null,
  void
>('textDocument/hover');
const CompletionRequest = new RequestType<
  TextDocumentPositionParams,
  CompletionItem[],
  void
>('textDocument/completion');
const DefinitionRequest = new RequestType<
  TextDocumentPositionParams,
  Location[] | null,
  void
>('textDocument/definition');
const InlayHintRequest = new RequestType<InlayHintParams, InlayHint[], void>(
  'textDocument/inlayHint',
);
const ConfigurationRequest = new RequestType<
  ConfigurationParams,
  unknown[],
  void
>('workspace/configuration');
const RegistrationRequest = new RequestType<RegistrationParams, void, void>(
  'client/registerCapability',
);

const InitializedNotification = new NotificationType<Record<string, never>>(
  'initialized',
);
const ExitNotification = new NotificationType0('exit');
const DidOpenNotification = new NotificationType<DidOpenTextDocumentParams>(
  'textDocument/didOpen',
);
const DidChangeNotification = new NotificationType<DidChangeTextDocumentParams>(
  'textDocument/didChange',
);
const DidCloseNotification = new NotificationType<DidCloseTextDocumentParams>(
  'textDocument/didClose',
);
const DidChangeConfigurationNotification = new NotificationType<{
  settings: unknown;
}>('workspace/didChangeConfiguration');
const DidChangeWorkspaceFoldersNotification =
  new NotificationType<WorkspaceFoldersChangeEvent>(
    'workspace/didChangeWorkspaceFolders',
  );
const PublishDiagnosticsNotification =
  new NotificationType<PublishDiagnosticsParams>(
    'textDocument/publishDiagnostics',
  );
const LogMessageNotification = new NotificationType<MessageParams>(
  'window/logMessage',
);
const ShowMessageNotification = new NotificationType<MessageParams>(
  'window/showMessage',
);

export interface RpcChannelOptions {
  invoker: BackendInvoker;
  initialSettings?: AdapterSettings;
  cwd?: string;
  schedule?: DiagnosticsSchedule;
  readTextFile?: (path: string) => Promise<string>;
  /** Called on `exit`: 0 after a shutdown request, 1 otherwise. */
  onExit?: (code: number) => void;
  /** Forward non-debug log lines to the client as window/logMessage. */
  forwardLogs?: boolean;
}

export interface RpcChannel {
  readonly store: DocumentStore;
  readonly settings: SettingsProvider;
  readonly publisher: DiagnosticsPublisher;
  readonly dispatcher: RequestDispatcher;
  dispose(): void;
}

type ServerState = 'uninitialized' | 'running' | 'shutdown';

const logger = getLogger('rpc');

const LOG_LEVEL_TO_MESSAGE_TYPE: Record<Exclude<LogLevel, 'debug'>, number> = {
  error: MessageType.Error,
  warn: MessageType.Warning,
  log: MessageType.Log,
};

/** Bridges a CancellationToken onto an AbortSignal for the backend call. */
function toAbortSignal(token: CancellationToken): {
  signal: AbortSignal;
  dispose: () => void;
} {
  const controller = new AbortController();
  if (token.isCancellationRequested) {
    controller.abort();
  }
  const subscription = token.onCancellationRequested(() => {
    controller.abort();
  });
  return {
    signal: controller.signal,
    dispose: () => subscription.dispose(),
  };
}

export function setupRpcChannel(
  connection: MessageConnection,
  options: RpcChannelOptions,
): RpcChannel {
  let state: ServerState = 'uninitialized';
  let clientCapabilities: ClientCapabilities = {};
  let detachLogSink: (() => void) | null = null;

  const store = new DocumentStore();
  const settings = new SettingsProvider(
    options.initialSettings ?? defaultSettings(),
  );

  const notify = <P>(type: NotificationType<P>, params: P): void => {
    connection.sendNotification(type, params).catch((error: unknown) => {
      logger.debug(() => `Failed to send ${type.method}: ${String(error)}`);
    });
  };

  const publisher = new DiagnosticsPublisher({
    store,
    invoker: options.invoker,
    settings,
    publish: (params) => notify(PublishDiagnosticsNotification, params),
    canPublish: () =>
      clientCapabilities.textDocument?.publishDiagnostics !== undefined,
    ...(options.schedule ? { schedule: options.schedule } : {}),
  });

  const dispatcher = new RequestDispatcher({
    store,
    invoker: options.invoker,
    settings,
    publisher,
    ...(options.cwd ? { cwd: options.cwd } : {}),
    ...(options.readTextFile ? { readTextFile: options.readTextFile } : {}),
  });

  const ensureRunning = (): void => {
    if (state === 'uninitialized') {
      throw new ResponseError(
        ErrorCodes.ServerNotInitialized,
        'Server has not been initialized',
      );
    }
    if (state === 'shutdown') {
      throw new ResponseError(
        ErrorCodes.InvalidRequest,
        'Server is shutting down',
      );
    }
  };

  /**
   * Notifications have no response to carry an error; document errors are
   * shown to the user, everything is logged.
   */
  const handleNotification = (
    method: string,
    work: () => void | Promise<void>,
  ): void => {
    if (state !== 'running') {
      logger.debug(() => `Dropping ${method} while ${state}`);
      return;
    }

    const report = (error: unknown): void => {
      const message = error instanceof Error ? error.message : String(error);
      logger.error(`${method} failed: ${message}`);
      if (isDocumentStoreError(error)) {
        notify(ShowMessageNotification, { type: MessageType.Error, message });
      }
    };

    try {
      const pending = work();
      if (pending) {
        void pending.catch(report);
      }
    } catch (error) {
      report(error);
    }
  };

  const withCancellation = async <T>(
    token: CancellationToken,
    run: (signal: AbortSignal) => Promise<T>,
  ): Promise<T> => {
    ensureRunning();
    const bridge = toAbortSignal(token);
    try {
      return await run(bridge.signal);
    } finally {
      bridge.dispose();
    }
  };

  connection.onRequest(InitializeRequest, (params) => {
    clientCapabilities = params.capabilities ?? {};

    const initializationOptions = params.initializationOptions;
    if (initializationOptions !== undefined && initializationOptions !== null) {
      settings.updateGlobal(
        extractSection(initializationOptions) ?? initializationOptions,
      );
    }

    settings.enablePull(
      clientCapabilities.workspace?.configuration === true
        ? async (scopeUri, section) => {
            const values = await connection.sendRequest(ConfigurationRequest, {
              items: [{ scopeUri, section }],
            });
            return values[0];
          }
        : null,
    );

    if (options.forwardLogs && !detachLogSink) {
      detachLogSink = Logger.attachSink((level, _namespace, message) => {
        if (level === 'debug') {
          return;
        }
        notify(LogMessageNotification, {
          type: LOG_LEVEL_TO_MESSAGE_TYPE[level],
          message,
        });
      });
    }

    state = 'running';
    return {
      capabilities: {
        positionEncoding: 'utf-16',
        textDocumentSync: { openClose: true, change: 2 },
        hoverProvider: true,
        completionProvider: {},
        definitionProvider: true,
        inlayHintProvider: { resolveProvider: false },
        workspace: {
          workspaceFolders: { supported: true, changeNotifications: true },
        },
      },
      serverInfo: { ...SERVER_INFO },
    };
  });

  connection.onNotification(InitializedNotification, () => {
    if (
      clientCapabilities.workspace?.didChangeConfiguration
        ?.dynamicRegistration !== true
    ) {
      return;
    }
    connection
      .sendRequest(RegistrationRequest, {
        registrations: [
          {
            id: DidChangeConfigurationNotification.method,
            method: DidChangeConfigurationNotification.method,
          },
        ],
      })
      .catch((error: unknown) => {
        logger.log(`Unable to register for configuration changes: ${String(error)}`);
      });
  });

  connection.onRequest(ShutdownRequest, () => {
    ensureRunning();
    state = 'shutdown';
    publisher.dispose();
    return null;
  });

  connection.onNotification(ExitNotification, () => {
    options.onExit?.(state === 'shutdown' ? 0 : 1);
  });

  connection.onNotification(DidOpenNotification, (params) => {
    handleNotification(DidOpenNotification.method, () =>
      dispatcher.didOpen(params),
    );
  });

  connection.onNotification(DidChangeNotification, (params) => {
    handleNotification(DidChangeNotification.method, () =>
      dispatcher.didChange(params),
    );
  });

  connection.onNotification(DidCloseNotification, (params) => {
    handleNotification(DidCloseNotification.method, () => {
      dispatcher.didClose(params);
      settings.forget(params.textDocument.uri);
    });
  });

  connection.onNotification(DidChangeConfigurationNotification, (params) => {
    handleNotification(DidChangeConfigurationNotification.method, async () => {
      settings.updateGlobal(extractSection(params.settings));
      await publisher.refreshAll();
    });
  });

  connection.onNotification(DidChangeWorkspaceFoldersNotification, (params) => {
    handleNotification(DidChangeWorkspaceFoldersNotification.method, () => {
      const names = (folders: Array<{ uri: string }>): string =>
        folders.map((folder) => folder.uri).join(', ');
      logger.log(
        `workspace folders: added=[${names(params.event.added)}]; removed=[${names(params.event.removed)}]`,
      );
    });
  });

  connection.onRequest(HoverRequest, (params, token) =>
    withCancellation(token, (signal) => dispatcher.hover(params, signal)),
  );

  connection.onRequest(CompletionRequest, (params, token) =>
    withCancellation(token, (signal) => dispatcher.completion(params, signal)),
  );

  connection.onRequest(DefinitionRequest, (params, token) =>
    withCancellation(token, (signal) => dispatcher.definition(params, signal)),
  );

  connection.onRequest(InlayHintRequest, (params) => {
    ensureRunning();
    return dispatcher.inlayHints(params);
  });

  return {
    store,
    settings,
    publisher,
    dispatcher,
    dispose: () => {
      publisher.dispose();
      detachLogSink?.();
      detachLogSink = null;
    },
  };
}
