import { TextDocument } from 'vscode-languageserver-textdocument';

import type {
  DocumentSnapshot,
  DocumentUri,
  Range,
  TextDocumentContentChangeEvent,
} from '../types.js';
import { DocumentStoreError } from './errors.js';

const freezeSnapshot = (snapshot: DocumentSnapshot): DocumentSnapshot =>
  Object.freeze({ ...snapshot });

const isRangeChange = (
  change: TextDocumentContentChangeEvent,
): change is { range: Range; rangeLength?: number; text: string } =>
  'range' in change && change.range !== undefined;

const comparePositions = (
  a: Range['start'],
  b: Range['start'],
): number => (a.line !== b.line ? a.line - b.line : a.character - b.character);

/**
 * Authoritative table of open documents. Every entry is a frozen snapshot;
 * a mutation replaces the entry, so snapshots handed out earlier never change.
 */
export class DocumentStore {
  private readonly documents = new Map<DocumentUri, DocumentSnapshot>();
  private nextGeneration = 1;

  public open(
    uri: DocumentUri,
    text: string,
    version: number,
    languageId: string,
  ): DocumentSnapshot {
    if (this.documents.has(uri)) {
      throw new DocumentStoreError(
        'AlreadyOpen',
        uri,
        `Document ${uri} is already open`,
      );
    }

    const snapshot = freezeSnapshot({
      uri,
      text,
      version,
      languageId,
      generation: this.nextGeneration,
    });
    this.nextGeneration += 1;
    this.documents.set(uri, snapshot);
    return snapshot;
  }

  /**
   * Applies one didChange batch. Each range edit is resolved against the text
   * produced by the edits before it. The batch is all-or-nothing.
   */
  public applyChange(
    uri: DocumentUri,
    version: number,
    edits: readonly TextDocumentContentChangeEvent[],
  ): DocumentSnapshot {
    const current = this.snapshot(uri);
    if (version !== current.version + 1) {
      throw new DocumentStoreError(
        'StaleVersion',
        uri,
        `Version ${version} for ${uri} does not follow current version ${current.version}`,
      );
    }

    for (const [index, edit] of edits.entries()) {
      if (
        isRangeChange(edit) &&
        comparePositions(edit.range.start, edit.range.end) > 0
      ) {
        throw new DocumentStoreError(
          'InvalidRange',
          uri,
          `Change ${index} for ${uri} has a range whose start is after its end`,
        );
      }
    }

    // Edits go to a scratch copy; the stored snapshot only moves on success.
    const document = TextDocument.update(
      TextDocument.create(uri, current.languageId, current.version, current.text),
      [...edits],
      version,
    );
    const next = freezeSnapshot({
      ...current,
      text: document.getText(),
      version,
    });
    this.documents.set(uri, next);
    return next;
  }

  public close(uri: DocumentUri): void {
    if (!this.documents.delete(uri)) {
      throw this.unknown(uri);
    }
  }

  public snapshot(uri: DocumentUri): DocumentSnapshot {
    const snapshot = this.documents.get(uri);
    if (!snapshot) {
      throw this.unknown(uri);
    }
    return snapshot;
  }

  public has(uri: DocumentUri): boolean {
    return this.documents.has(uri);
  }

  public uris(): DocumentUri[] {
    return [...this.documents.keys()];
  }

  public get size(): number {
    return this.documents.size;
  }

  private unknown(uri: DocumentUri): DocumentStoreError {
    return new DocumentStoreError(
      'UnknownDocument',
      uri,
      `Document ${uri} is not open`,
    );
  }
}
