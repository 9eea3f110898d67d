import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import { delimiter } from 'node:path';

import type { AdapterSettings } from '../config.js';
import type {
  BackendRequest,
  BackendResult,
  CapabilityKind,
  DocumentSnapshot,
  Position,
} from '../types.js';
import { InvokeError } from './errors.js';
import { getLogger } from './logger.js';
import { formatCursorArgument, toBackend } from './position-codec.js';

export type InvokeResult =
  | { ok: true; result: BackendResult }
  | { ok: false; error: InvokeError };

export interface InvokeOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

/** The process boundary. Tests substitute a scripted implementation. */
export interface BackendInvoker {
  invoke(
    request: BackendRequest,
    options: InvokeOptions,
  ): Promise<InvokeResult>;
}

export interface ProcessInvokerConfig {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
}

const logger = getLogger('invoker');

/**
 * Builds the command line for one capability call. Cursor capabilities get
 * the position converted to the backend's convention as a trailing argument.
 */
export function createBackendRequest(
  kind: CapabilityKind,
  snapshot: DocumentSnapshot,
  settings: AdapterSettings,
  position?: Position,
): BackendRequest {
  const args = [...settings.extraArgs];
  if (settings.includeDirs.length > 0) {
    args.push('--include-path', settings.includeDirs.join(delimiter));
  }
  args.push(settings.flags[kind]);
  if (position && kind !== 'check') {
    args.push(
      formatCursorArgument(toBackend(snapshot, position, settings.position)),
    );
  }

  return Object.freeze({
    kind,
    snapshot,
    executable: settings.executablePath,
    args: Object.freeze(args),
    ...(position ? { position } : {}),
  });
}

export const formatCommandLine = (request: BackendRequest): string =>
  [request.executable, ...request.args].join(' ');

export class ProcessBackendInvoker implements BackendInvoker {
  public constructor(private readonly config: ProcessInvokerConfig = {}) {}

  public async invoke(
    request: BackendRequest,
    options: InvokeOptions,
  ): Promise<InvokeResult> {
    const commandLine = formatCommandLine(request);
    const failure = (
      kind: InvokeError['kind'],
      message: string,
      exitCode: number | null = null,
      stderr = '',
    ): InvokeResult => ({
      ok: false,
      error: new InvokeError(kind, commandLine, message, exitCode, stderr),
    });

    if (options.signal?.aborted) {
      return failure('Cancelled', `${commandLine} cancelled before start`);
    }

    const startedAt = Date.now();
    logger.debug(() => `spawn ${commandLine} (${request.snapshot.uri})`);

    return await new Promise<InvokeResult>((resolve) => {
      let settled = false;
      let timer: ReturnType<typeof setTimeout> | null = null;
      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];

      let proc: ChildProcessWithoutNullStreams;
      try {
        proc = spawn(request.executable, [...request.args], {
          cwd: this.config.cwd ?? process.cwd(),
          env: this.config.env ?? process.env,
          stdio: ['pipe', 'pipe', 'pipe'],
          windowsHide: true,
        });
      } catch (error) {
        resolve(
          failure(
            'SpawnFailed',
            `Cannot start ${request.executable}: ${String(error)}`,
          ),
        );
        return;
      }

      const collected = (chunks: Buffer[]): string =>
        Buffer.concat(chunks).toString('utf8');

      const finish = (outcome: InvokeResult): void => {
        if (settled) {
          return;
        }
        settled = true;
        if (timer !== null) {
          clearTimeout(timer);
          timer = null;
        }
        options.signal?.removeEventListener('abort', onAbort);
        resolve(outcome);
      };

      const kill = (): void => {
        if (proc.exitCode === null && proc.signalCode === null) {
          proc.kill('SIGKILL');
        }
      };

      const onAbort = (): void => {
        kill();
        finish(failure('Cancelled', `${commandLine} cancelled`));
      };

      proc.on('error', (error: NodeJS.ErrnoException) => {
        kill();
        finish(
          failure(
            'SpawnFailed',
            `Cannot start ${request.executable}: ${error.message}`,
          ),
        );
      });

      proc.stdout.on('data', (chunk: Buffer) => {
        stdoutChunks.push(chunk);
      });

      proc.stderr.on('data', (chunk: Buffer) => {
        stderrChunks.push(chunk);
      });

      // The backend may exit without reading its input.
      proc.stdin.on('error', (error: NodeJS.ErrnoException) => {
        logger.debug(() => `stdin of ${commandLine}: ${error.message}`);
      });

      proc.on(
        'close',
        (exitCode: number | null, signal: NodeJS.Signals | null) => {
          const stdout = collected(stdoutChunks);
          const stderr = collected(stderrChunks);
          const elapsedMs = Date.now() - startedAt;

          if (exitCode === 0) {
            finish({
              ok: true,
              result: { stdout, stderr, exitCode, elapsedMs, commandLine },
            });
            return;
          }

          const status =
            exitCode === null ? `signal ${String(signal)}` : `code ${exitCode}`;
          finish(
            failure(
              'NonZeroExit',
              `${commandLine} exited with ${status}`,
              exitCode,
              stderr,
            ),
          );
        },
      );

      timer = setTimeout(() => {
        kill();
        finish(
          failure(
            'Timeout',
            `${commandLine} did not finish within ${options.timeoutMs}ms`,
          ),
        );
      }, options.timeoutMs);

      options.signal?.addEventListener('abort', onAbort, { once: true });

      proc.stdin.end(request.snapshot.text, 'utf8');
    });
  }
}
