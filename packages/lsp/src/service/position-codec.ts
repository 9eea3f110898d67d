import { TextDocument } from 'vscode-languageserver-textdocument';

import type { BackendConvention } from '../config.js';
import type { Position, Range } from '../types.js';

export type ColumnUnit = BackendConvention['columnUnit'];

export type BackendPosition =
  | { kind: 'lineColumn'; line: number; column: number }
  | { kind: 'offset'; offset: number };

export interface TextSource {
  readonly text: string;
}

const isHighSurrogate = (code: number): boolean =>
  code >= 0xd800 && code <= 0xdbff;

const isLowSurrogate = (code: number): boolean =>
  code >= 0xdc00 && code <= 0xdfff;

function unitWidth(codePoint: string, unit: ColumnUnit): number {
  switch (unit) {
    case 'utf16':
      return codePoint.length;
    case 'codepoint':
      return 1;
    case 'byte':
      return Buffer.byteLength(codePoint, 'utf8');
  }
}

/** Length of `text` measured in `unit`. */
export function measure(text: string, unit: ColumnUnit): number {
  if (unit === 'utf16') {
    return text.length;
  }
  if (unit === 'byte') {
    return Buffer.byteLength(text, 'utf8');
  }
  return Array.from(text).length;
}

/**
 * UTF-16 index inside `text` reached after consuming `units` of `unit`.
 * A count that lands inside a code point snaps back to its start.
 */
export function indexForUnits(
  text: string,
  units: number,
  unit: ColumnUnit,
): number {
  let index = 0;
  let consumed = 0;
  for (const codePoint of text) {
    const width = unitWidth(codePoint, unit);
    if (consumed + width > units) {
      break;
    }
    consumed += width;
    index += codePoint.length;
  }
  return index;
}

const LINE_TERMINATOR = /(?:\r\n|\r|\n)$/u;

const textDocuments = new WeakMap<TextSource, TextDocument>();

/** Line-indexed view of a text, cached per source object. */
export function textDocumentOf(doc: TextSource): TextDocument {
  let document = textDocuments.get(doc);
  if (!document || document.getText() !== doc.text) {
    document = TextDocument.create('', 'plaintext', 0, doc.text);
    textDocuments.set(doc, document);
  }
  return document;
}

/** Text of `line` without its terminator. */
export function lineText(document: TextDocument, line: number): string {
  return document
    .getText({
      start: { line, character: 0 },
      end: { line: line + 1, character: 0 },
    })
    .replace(LINE_TERMINATOR, '');
}

/** Moves a protocol position onto the document: clamped, never mid-pair. */
export function clamp(document: TextDocument, position: Position): Position {
  if (position.line < 0) {
    return { line: 0, character: 0 };
  }
  if (position.line >= document.lineCount) {
    const last = document.lineCount - 1;
    return { line: last, character: lineText(document, last).length };
  }

  const text = lineText(document, position.line);
  let character = Math.max(0, Math.min(position.character, text.length));
  if (
    character > 0 &&
    character < text.length &&
    isHighSurrogate(text.charCodeAt(character - 1)) &&
    isLowSurrogate(text.charCodeAt(character))
  ) {
    character -= 1;
  }
  return { line: position.line, character };
}

export function toBackend(
  doc: TextSource,
  position: Position,
  convention: BackendConvention,
): BackendPosition {
  const document = textDocumentOf(doc);
  const clamped = clamp(document, position);
  const unit = convention.columnUnit;

  if (convention.style === 'offset') {
    const prefix = document.getText({
      start: { line: 0, character: 0 },
      end: clamped,
    });
    return { kind: 'offset', offset: measure(prefix, unit) };
  }

  const prefix = lineText(document, clamped.line).slice(0, clamped.character);
  return {
    kind: 'lineColumn',
    line: clamped.line + convention.lineBase,
    column: measure(prefix, unit) + convention.columnBase,
  };
}

export function fromBackend(
  doc: TextSource,
  position: BackendPosition,
  convention: BackendConvention,
): Position {
  const document = textDocumentOf(doc);
  const unit = convention.columnUnit;

  if (position.kind === 'offset') {
    // positionAt can land between \r and \n.
    const offset = indexForUnits(document.getText(), position.offset, unit);
    return clamp(document, document.positionAt(offset));
  }

  const line = position.line - convention.lineBase;
  if (line < 0) {
    return { line: 0, character: 0 };
  }
  if (line >= document.lineCount) {
    return clamp(document, { line, character: 0 });
  }

  const units = Math.max(0, position.column - convention.columnBase);
  return {
    line,
    character: indexForUnits(lineText(document, line), units, unit),
  };
}

export function rangeFromBackend(
  doc: TextSource,
  start: BackendPosition,
  end: BackendPosition,
  convention: BackendConvention,
): Range {
  const from = fromBackend(doc, start, convention);
  const to = fromBackend(doc, end, convention);
  const reversed =
    to.line < from.line ||
    (to.line === from.line && to.character < from.character);
  return reversed ? { start: to, end: from } : { start: from, end: to };
}

/** Fields one position occupies in a backend output record. */
export function positionFieldCount(convention: BackendConvention): number {
  return convention.style === 'offset' ? 1 : 2;
}

const NON_NEGATIVE_INTEGER = /^\d+$/u;

export function parsePositionFields(
  fields: readonly string[],
  convention: BackendConvention,
): BackendPosition | undefined {
  if (fields.length !== positionFieldCount(convention)) {
    return undefined;
  }
  if (!fields.every((field) => NON_NEGATIVE_INTEGER.test(field.trim()))) {
    return undefined;
  }
  const numbers = fields.map((field) => Number.parseInt(field.trim(), 10));
  if (convention.style === 'offset') {
    return { kind: 'offset', offset: numbers[0] ?? 0 };
  }
  return {
    kind: 'lineColumn',
    line: numbers[0] ?? 0,
    column: numbers[1] ?? 0,
  };
}

/** Cursor argument handed to the backend on its command line. */
export function formatCursorArgument(position: BackendPosition): string {
  return position.kind === 'offset'
    ? String(position.offset)
    : `${position.line}:${position.column}`;
}
