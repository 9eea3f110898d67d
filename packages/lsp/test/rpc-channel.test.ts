import { PassThrough } from 'node:stream';

import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  CancellationTokenSource,
  createMessageConnection,
  NullLogger,
  StreamMessageReader,
  StreamMessageWriter,
  type MessageConnection,
} from 'vscode-jsonrpc/node.js';

import {
  setupRpcChannel,
  type InitializeParams,
  type RpcChannel,
} from '../src/channels/rpc-channel.js';
import type { PublishDiagnosticsParams } from '../src/types.js';
import {
  failedResult,
  okResult,
  ScriptedInvoker,
} from './helpers/scripted-invoker.js';
import { lineSettings } from './helpers/settings.js';

const URI = 'file:///a.txt';
const TEXT = 'let x = 1\nprint x';

const FULL_CAPABILITIES: InitializeParams['capabilities'] = {
  textDocument: { publishDiagnostics: {} },
  workspace: { didChangeConfiguration: { dynamicRegistration: true } },
};

function createConnectionPair() {
  const serverToClient = new PassThrough();
  const clientToServer = new PassThrough();

  const client = createMessageConnection(
    new StreamMessageReader(serverToClient),
    new StreamMessageWriter(clientToServer),
    NullLogger,
  );

  const server = createMessageConnection(
    new StreamMessageReader(clientToServer),
    new StreamMessageWriter(serverToClient),
    NullLogger,
  );

  return { client, server };
}

const hoverAt = (line: number, character: number) => ({
  textDocument: { uri: URI },
  position: { line, character },
});

describe('RPC channel', () => {
  let client: MessageConnection;
  let server: MessageConnection;
  let channel: RpcChannel;
  let invoker: ScriptedInvoker;
  let onExit: ReturnType<typeof vi.fn>;
  let diagnostics: PublishDiagnosticsParams[];
  let messages: Array<{ type: number; message: string }>;

  const start = (): void => {
    const pair = createConnectionPair();
    client = pair.client;
    server = pair.server;
    invoker = new ScriptedInvoker((request) =>
      request.kind === 'hover' ? okResult('x: int\n') : okResult(''),
    );
    onExit = vi.fn();
    diagnostics = [];
    messages = [];

    channel = setupRpcChannel(server, {
      invoker,
      onExit,
      initialSettings: lineSettings(),
    });
    client.onNotification(
      'textDocument/publishDiagnostics',
      (params: PublishDiagnosticsParams) => {
        diagnostics.push(params);
      },
    );
    client.onNotification(
      'window/showMessage',
      (params: { type: number; message: string }) => {
        messages.push(params);
      },
    );
    server.listen();
    client.listen();
  };

  const initialize = async (
    capabilities: InitializeParams['capabilities'] = FULL_CAPABILITIES,
    initializationOptions?: unknown,
  ): Promise<unknown> => {
    const result: unknown = await client.sendRequest('initialize', {
      processId: null,
      capabilities,
      initializationOptions,
    });
    await client.sendNotification('initialized', {});
    return result;
  };

  const open = async (): Promise<void> => {
    await client.sendNotification('textDocument/didOpen', {
      textDocument: { uri: URI, languageId: 'plaintext', version: 1, text: TEXT },
    });
  };

  afterEach(() => {
    channel.dispose();
    client.dispose();
    server.dispose();
  });

  it('rejects requests before initialize', async () => {
    start();

    await expect(
      client.sendRequest('textDocument/hover', hoverAt(0, 0)),
    ).rejects.toMatchObject({ code: -32002 });
  });

  it('advertises its capabilities', async () => {
    start();

    await expect(initialize()).resolves.toMatchObject({
      capabilities: {
        positionEncoding: 'utf-16',
        textDocumentSync: { openClose: true, change: 2 },
        hoverProvider: true,
        definitionProvider: true,
        inlayHintProvider: { resolveProvider: false },
      },
      serverInfo: { name: 'clibridge-lsp' },
    });
  });

  it('answers hover for an opened document and publishes its diagnostics', async () => {
    start();
    await initialize();
    await open();

    const hover = await client.sendRequest('textDocument/hover', hoverAt(1, 7));

    expect(hover).toEqual({ contents: 'x: int' });
    expect(invoker.callsFor('hover')[0]?.args).toEqual(['--ide-hover', '2:7']);
    await vi.waitFor(() =>
      expect(diagnostics).toEqual([{ uri: URI, version: 1, diagnostics: [] }]),
    );
  });

  it('does not check documents when the client cannot receive diagnostics', async () => {
    start();
    await initialize({});
    await open();

    await client.sendRequest('textDocument/hover', hoverAt(0, 0));

    expect(invoker.callsFor('check')).toHaveLength(0);
    expect(diagnostics).toEqual([]);
  });

  it('shows a message when a change arrives out of order', async () => {
    start();
    await initialize();
    await open();

    await client.sendNotification('textDocument/didChange', {
      textDocument: { uri: URI, version: 5 },
      contentChanges: [{ text: 'ignored' }],
    });

    await vi.waitFor(() =>
      expect(messages).toEqual([
        {
          type: 1,
          message: `Version 5 for ${URI} does not follow current version 1`,
        },
      ]),
    );
    expect(channel.store.snapshot(URI).text).toBe(TEXT);
  });

  it('kills the backend and answers RequestCancelled on cancellation', async () => {
    start();
    await initialize();
    await open();

    let aborted = false;
    invoker.respondWith(async (request, options) => {
      if (request.kind !== 'hover') {
        return okResult('');
      }
      await new Promise<void>((resolve) => {
        options.signal?.addEventListener('abort', () => resolve());
      });
      aborted = true;
      return failedResult('Cancelled');
    });

    const source = new CancellationTokenSource();
    const pending = client.sendRequest(
      'textDocument/hover',
      hoverAt(0, 0),
      source.token,
    );
    await vi.waitFor(() => expect(invoker.callsFor('hover')).toHaveLength(1));
    source.cancel();

    await expect(pending).rejects.toMatchObject({ code: -32800 });
    expect(aborted).toBe(true);
  });

  it('replaces the settings with each configuration change', async () => {
    start();
    await initialize();
    await open();

    await client.sendNotification('workspace/didChangeConfiguration', {
      settings: { clibridge: { flags: { hover: '--describe' } } },
    });
    await client.sendRequest('textDocument/hover', hoverAt(0, 0));

    // Fields the change leaves out take their defaults: a byte offset cursor.
    expect(invoker.callsFor('hover')[0]?.args).toEqual(['--describe', '0']);
  });

  it('takes settings from initializationOptions', async () => {
    start();
    await initialize(FULL_CAPABILITIES, { executablePath: 'checker' });
    await open();

    await client.sendRequest('textDocument/hover', hoverAt(0, 0));

    expect(invoker.callsFor('hover')[0]?.executable).toBe('checker');
  });

  it('pulls per-document settings when the client supports it', async () => {
    start();
    client.onRequest(
      'workspace/configuration',
      (params: { items: Array<{ scopeUri?: string; section?: string }> }) =>
        params.items.map((item) =>
          item.section === 'clibridge' ? { executablePath: 'scoped' } : null,
        ),
    );
    await initialize({ workspace: { configuration: true } });
    await open();

    await client.sendRequest('textDocument/hover', hoverAt(0, 0));

    expect(invoker.callsFor('hover')[0]?.executable).toBe('scoped');
  });

  it('registers for configuration changes once initialized', async () => {
    start();
    const registrations: unknown[] = [];
    client.onRequest('client/registerCapability', (params: unknown) => {
      registrations.push(params);
      return null;
    });

    await initialize();

    await vi.waitFor(() =>
      expect(registrations).toEqual([
        {
          registrations: [
            {
              id: 'workspace/didChangeConfiguration',
              method: 'workspace/didChangeConfiguration',
            },
          ],
        },
      ]),
    );
  });

  it('refuses requests after shutdown and exits cleanly', async () => {
    start();
    await initialize();
    await open();

    await expect(client.sendRequest('shutdown')).resolves.toBeNull();
    await expect(
      client.sendRequest('textDocument/hover', hoverAt(0, 0)),
    ).rejects.toMatchObject({ code: -32600 });

    await client.sendNotification('exit');
    await vi.waitFor(() => expect(onExit).toHaveBeenCalledWith(0));
  });

  it('exits with an error code without a prior shutdown', async () => {
    start();
    await initialize();

    await client.sendNotification('exit');

    await vi.waitFor(() => expect(onExit).toHaveBeenCalledWith(1));
  });
});
