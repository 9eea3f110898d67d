export type DocumentUri = string;

export interface Position {
  line: number;
  character: number;
}

export interface Range {
  start: Position;
  end: Position;
}

export interface Location {
  uri: DocumentUri;
  range: Range;
}

export const DiagnosticSeverity = {
  Error: 1,
  Warning: 2,
  Information: 3,
  Hint: 4,
} as const;

export type DiagnosticSeverity =
  (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity];

export interface Diagnostic {
  range: Range;
  severity: DiagnosticSeverity;
  message: string;
  source: string;
}

export interface Hover {
  contents: string;
  range?: Range;
}

export interface CompletionItem {
  label: string;
  kind?: number;
  detail?: string;
}

export interface InlayHint {
  position: Position;
  label: string;
  kind?: number;
  paddingLeft?: boolean;
}

export type TextDocumentContentChangeEvent =
  | { text: string }
  | { range: Range; rangeLength?: number; text: string };

export interface TextDocumentItem {
  uri: DocumentUri;
  languageId: string;
  version: number;
  text: string;
}

export interface TextDocumentIdentifier {
  uri: DocumentUri;
}

export interface VersionedTextDocumentIdentifier {
  uri: DocumentUri;
  version: number;
}

export interface TextDocumentPositionParams {
  textDocument: TextDocumentIdentifier;
  position: Position;
}

export interface DidOpenTextDocumentParams {
  textDocument: TextDocumentItem;
}

export interface DidChangeTextDocumentParams {
  textDocument: VersionedTextDocumentIdentifier;
  contentChanges: TextDocumentContentChangeEvent[];
}

export interface DidCloseTextDocumentParams {
  textDocument: TextDocumentIdentifier;
}

export interface InlayHintParams {
  textDocument: TextDocumentIdentifier;
  range: Range;
}

export interface PublishDiagnosticsParams {
  uri: DocumentUri;
  version?: number;
  diagnostics: Diagnostic[];
}

/** Capabilities that map onto one backend invocation each. */
export type CapabilityKind = 'hover' | 'completion' | 'definition' | 'check';

/**
 * Immutable copy of a document taken when a request is admitted. Requests
 * never look at the live store entry after this point.
 */
export interface DocumentSnapshot {
  readonly uri: DocumentUri;
  readonly languageId: string;
  readonly version: number;
  readonly text: string;
  /** Distinguishes successive opens of the same URI. */
  readonly generation: number;
}

export interface BackendRequest {
  readonly kind: CapabilityKind;
  readonly snapshot: DocumentSnapshot;
  readonly position?: Position;
  readonly executable: string;
  readonly args: readonly string[];
}

export interface BackendResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly elapsedMs: number;
  readonly commandLine: string;
}
