import { ErrorCodes, ResponseError } from 'vscode-jsonrpc';

import type { DocumentUri } from '../types.js';

/** LSP-level codes that sit outside the JSON-RPC reserved range. */
export const LspErrorCodes = {
  RequestFailed: -32803,
  RequestCancelled: -32800,
} as const;

export type DocumentStoreErrorKind =
  | 'AlreadyOpen'
  | 'UnknownDocument'
  | 'StaleVersion'
  | 'InvalidRange';

export class DocumentStoreError extends Error {
  public constructor(
    public readonly kind: DocumentStoreErrorKind,
    public readonly uri: DocumentUri,
    message: string,
  ) {
    super(message);
    this.name = 'DocumentStoreError';
  }
}

export type InvokeErrorKind =
  | 'SpawnFailed'
  | 'Timeout'
  | 'NonZeroExit'
  | 'Cancelled';

export class InvokeError extends Error {
  public constructor(
    public readonly kind: InvokeErrorKind,
    public readonly commandLine: string,
    message: string,
    public readonly exitCode: number | null = null,
    public readonly stderr = '',
  ) {
    super(message);
    this.name = 'InvokeError';
  }
}

export function isDocumentStoreError(
  error: unknown,
): error is DocumentStoreError {
  return error instanceof DocumentStoreError;
}

export function cancelledError(): ResponseError<void> {
  return new ResponseError(LspErrorCodes.RequestCancelled, 'Request cancelled');
}

/**
 * Maps anything thrown inside a request handler onto the error the client
 * receives. Store errors are the client's fault (bad params); anything else
 * is an internal failure of this one request.
 */
export function toResponseError(error: unknown): ResponseError<void> {
  if (error instanceof ResponseError) {
    return new ResponseError(error.code, error.message);
  }

  if (error instanceof DocumentStoreError) {
    return new ResponseError(ErrorCodes.InvalidParams, error.message);
  }

  if (error instanceof InvokeError) {
    switch (error.kind) {
      case 'Cancelled':
        return cancelledError();
      case 'SpawnFailed':
        return new ResponseError(ErrorCodes.InternalError, error.message);
      case 'Timeout':
      case 'NonZeroExit':
        return new ResponseError(LspErrorCodes.RequestFailed, error.message);
    }
  }

  const message = error instanceof Error ? error.message : String(error);
  return new ResponseError(ErrorCodes.InternalError, message);
}
