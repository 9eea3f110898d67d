import createDebug from 'debug';
import type { Debugger } from 'debug';

export type LogLevel = 'debug' | 'log' | 'warn' | 'error';

/** Receives every non-debug line, e.g. to forward it as window/logMessage. */
export type LogSink = (level: LogLevel, namespace: string, message: string) => void;

const ROOT_NAMESPACE = 'clibridge:lsp';

export class Logger {
  private static readonly instances = new Map<string, Logger>();
  private static sink: LogSink | null = null;

  private readonly debugInstance: Debugger;

  private constructor(public readonly namespace: string) {
    this.debugInstance = createDebug(namespace);
  }

  /** One logger per namespace, created on first use. */
  public static getLogger(name: string): Logger {
    const namespace = `${ROOT_NAMESPACE}:${name}`;
    let logger = Logger.instances.get(namespace);
    if (!logger) {
      logger = new Logger(namespace);
      Logger.instances.set(namespace, logger);
    }
    return logger;
  }

  /** Returns a function that restores the previous sink. */
  public static attachSink(sink: LogSink | null): () => void {
    const previous = Logger.sink;
    Logger.sink = sink;
    return () => {
      Logger.sink = previous;
    };
  }

  public get enabled(): boolean {
    return this.debugInstance.enabled;
  }

  public debug(messageOrFn: string | (() => string), ...args: unknown[]): void {
    if (!this.debugInstance.enabled) {
      return;
    }
    this.debugInstance(this.render(messageOrFn), ...args);
  }

  public log(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.emit('log', messageOrFn, args);
  }

  public warn(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.emit('warn', messageOrFn, args);
  }

  public error(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.emit('error', messageOrFn, args);
  }

  private emit(
    level: Exclude<LogLevel, 'debug'>,
    messageOrFn: string | (() => string),
    args: unknown[],
  ): void {
    const sink = Logger.sink;
    if (!sink && !this.debugInstance.enabled) {
      return;
    }

    const message = this.render(messageOrFn);
    if (this.debugInstance.enabled) {
      this.debugInstance(`[${level}] ${message}`, ...args);
    }
    sink?.(level, this.namespace, message);
  }

  private render(messageOrFn: string | (() => string)): string {
    if (typeof messageOrFn === 'string') {
      return messageOrFn;
    }
    try {
      return messageOrFn();
    } catch {
      return '[Error evaluating log function]';
    }
  }
}

export const getLogger = (name: string): Logger => Logger.getLogger(name);
