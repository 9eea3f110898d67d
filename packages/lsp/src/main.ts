import { realpathSync } from 'node:fs';
import { stderr } from 'node:process';
import { pathToFileURL } from 'node:url';

import {
  createMessageConnection,
  StreamMessageReader,
  StreamMessageWriter,
  type MessageConnection,
} from 'vscode-jsonrpc/node.js';

import { setupRpcChannel, type RpcChannel } from './channels/rpc-channel.js';
import {
  defaultSettings,
  resolveSettings,
  type AdapterSettings,
} from './config.js';
import { ProcessBackendInvoker } from './service/backend-invoker.js';

/** Optional JSON object with startup settings (same shape as the section). */
export const SETTINGS_ENV = 'CLIBRIDGE_SETTINGS';

const fatal = (message: string): never => {
  stderr.write(`${message}\n`);
  process.exit(1);
  throw new Error(message);
};

const isObject = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const parseSettingsFromEnv = (): AdapterSettings => {
  const raw = process.env[SETTINGS_ENV];
  if (raw === undefined || raw.trim().length === 0) {
    return defaultSettings();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return fatal(`${SETTINGS_ENV} must be valid JSON`);
  }

  if (!isObject(parsed)) {
    return fatal(`${SETTINGS_ENV} must be a JSON object`);
  }

  const { settings, issues } = resolveSettings(parsed);
  if (issues.length > 0) {
    return fatal(`${SETTINGS_ENV} is invalid: ${issues.join('; ')}`);
  }
  return settings;
};

const createRpcConnection = (): MessageConnection =>
  createMessageConnection(
    new StreamMessageReader(process.stdin),
    new StreamMessageWriter(process.stdout),
  );

export function main(): void {
  const initialSettings = parseSettingsFromEnv();
  const cwd = process.cwd();

  const rpcConnection = createRpcConnection();
  let channel: RpcChannel | null = null;

  let shuttingDown = false;
  const shutdown = (code: number): void => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    channel?.dispose();
    rpcConnection.dispose();
    process.exit(code);
  };

  channel = setupRpcChannel(rpcConnection, {
    invoker: new ProcessBackendInvoker({ cwd }),
    initialSettings,
    cwd,
    forwardLogs: true,
    onExit: shutdown,
  });

  rpcConnection.onClose(() => shutdown(1));
  rpcConnection.listen();

  process.on('SIGTERM', () => shutdown(0));
  process.on('SIGINT', () => shutdown(0));

  process.on('uncaughtException', (error) => {
    stderr.write(`Uncaught exception in language server: ${String(error)}\n`);
    shutdown(1);
  });

  process.on('unhandledRejection', (error) => {
    stderr.write(`Unhandled rejection in language server: ${String(error)}\n`);
  });
}

const isMainModule = (): boolean => {
  const argvEntry = process.argv[1];
  if (!argvEntry || !import.meta.url.startsWith('file://')) {
    return false;
  }

  try {
    return import.meta.url === pathToFileURL(realpathSync(argvEntry)).href;
  } catch {
    return false;
  }
};

if (isMainModule()) {
  try {
    main();
  } catch (error) {
    stderr.write(`Fatal error in language server: ${String(error)}\n`);
    process.exit(1);
  }
}
