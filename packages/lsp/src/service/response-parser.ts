import { isAbsolute, resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { z } from 'zod';

import type { BackendConvention, OutputFormat } from '../config.js';
import {
  DiagnosticSeverity,
  type CompletionItem,
  type Diagnostic,
  type DocumentUri,
  type Hover,
  type InlayHint,
  type Location,
} from '../types.js';
import {
  fromBackend,
  parsePositionFields,
  positionFieldCount,
  rangeFromBackend,
  type BackendPosition,
  type TextSource,
} from './position-codec.js';

/** Outcome of decoding one line of backend output. */
export type LineOutcome<T> =
  | { kind: 'ok'; value: T }
  | { kind: 'skipped'; raw: string }
  | { kind: 'malformed'; raw: string; reason: string };

export interface ParseReport<T> {
  values: T[];
  malformed: Array<{ raw: string; reason: string }>;
}

const FIELD_SEPARATOR = '\t';

/** Targets meaning "defined nowhere the client can open". */
const NON_NAVIGABLE_TARGETS = new Set(['', '__prelude__']);

export const COMPLETION_ITEM_KINDS: Readonly<Record<string, number>> = {
  text: 1,
  method: 2,
  function: 3,
  command: 3,
  constructor: 4,
  field: 5,
  variable: 6,
  class: 7,
  interface: 8,
  module: 9,
  property: 10,
  unit: 11,
  value: 12,
  enum: 13,
  keyword: 14,
  snippet: 15,
  color: 16,
  file: 17,
  reference: 18,
  folder: 19,
  enummember: 20,
  constant: 21,
  struct: 22,
  event: 23,
  operator: 24,
  typeparameter: 25,
};

const SEVERITIES: Readonly<Record<string, DiagnosticSeverity>> = {
  error: DiagnosticSeverity.Error,
  warning: DiagnosticSeverity.Warning,
  info: DiagnosticSeverity.Information,
  information: DiagnosticSeverity.Information,
  hint: DiagnosticSeverity.Hint,
};

const INLAY_HINT_TAG = 'inlay';
const INLAY_HINT_KIND_TYPE = 1;

const ok = <T>(value: T): LineOutcome<T> => ({ kind: 'ok', value });

const malformed = (raw: string, reason: string): LineOutcome<never> => ({
  kind: 'malformed',
  raw,
  reason,
});

/**
 * Splits output into records and decodes each one independently, so one bad
 * line never hides the others. Blank lines and `#` comments are skipped.
 */
export function parseLines<T>(
  output: string,
  decode: (fields: string[], raw: string) => LineOutcome<T>,
): LineOutcome<T>[] {
  return output.split(/\r?\n/u).map((raw): LineOutcome<T> => {
    if (raw.trim().length === 0 || raw.trimStart().startsWith('#')) {
      return { kind: 'skipped', raw };
    }
    return decode(raw.split(FIELD_SEPARATOR), raw);
  });
}

export function collect<T>(
  outcomes: readonly LineOutcome<T>[],
): ParseReport<T> {
  const report: ParseReport<T> = { values: [], malformed: [] };
  for (const outcome of outcomes) {
    if (outcome.kind === 'ok') {
      report.values.push(outcome.value);
    } else if (outcome.kind === 'malformed') {
      report.malformed.push({ raw: outcome.raw, reason: outcome.reason });
    }
  }
  return report;
}

const spanSchema = z.object({
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
});

const hoverJsonSchema = z.object({
  hover: z.string(),
  span: spanSchema.nullish(),
});

const completionJsonSchema = z.object({
  completions: z.array(
    z.union([
      z.string(),
      z.object({
        label: z.string(),
        kind: z.string().optional(),
        detail: z.string().optional(),
      }),
    ]),
  ),
});

const definitionJsonSchema = z.object({
  file: z.string(),
  start: z.number().int().nonnegative(),
  end: z.number().int().nonnegative(),
});

const checkJsonSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('diagnostic'),
    severity: z.string(),
    message: z.string(),
    span: spanSchema,
  }),
  z.object({
    type: z.literal('hint'),
    typename: z.string(),
    position: spanSchema,
  }),
]);

const offsetOf = (offset: number): BackendPosition => ({
  kind: 'offset',
  offset,
});

function decodeJson<S extends z.ZodTypeAny>(
  raw: string,
  schema: S,
): LineOutcome<z.output<S>> {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return malformed(raw, 'not valid JSON');
  }

  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
    return malformed(raw, `${where}${issue?.message ?? 'unexpected shape'}`);
  }
  return ok<z.output<S>>(parsed.data);
}

/** Decodes output that is a single JSON document; nothing printed yields nothing. */
function parseJsonDocument<S extends z.ZodTypeAny, T>(
  output: string,
  schema: S,
  map: (value: z.output<S>, raw: string) => LineOutcome<T>,
): LineOutcome<T>[] {
  const raw = output.trim();
  if (raw.length === 0) {
    return [];
  }
  const decoded = decodeJson(raw, schema);
  return [decoded.kind === 'ok' ? map(decoded.value, raw) : decoded];
}

/**
 * Line output: the whole text is the hover. JSON output: `{hover, span?}`,
 * where the span becomes the hover range.
 */
export function parseHoverOutput(
  output: string,
  format: OutputFormat,
  doc: TextSource,
  convention: BackendConvention,
): ParseReport<Hover> {
  if (format === 'json') {
    return collect(
      parseJsonDocument(output, hoverJsonSchema, (value, raw) => {
        if (value.hover.trim().length === 0) {
          return { kind: 'skipped', raw };
        }
        return ok<Hover>({
          contents: value.hover,
          ...(value.span
            ? {
                range: rangeFromBackend(
                  doc,
                  offsetOf(value.span.start),
                  offsetOf(value.span.end),
                  convention,
                ),
              }
            : {}),
        });
      }),
    );
  }

  const contents = output.trimEnd();
  if (contents.trim().length === 0) {
    return { values: [], malformed: [] };
  }
  return { values: [{ contents }], malformed: [] };
}

const completionKind = (name: string | undefined): number | undefined =>
  name === undefined
    ? undefined
    : COMPLETION_ITEM_KINDS[name.trim().toLowerCase()];

function completionItem(
  label: string,
  kindName: string | undefined,
  detail: string | undefined,
): CompletionItem {
  const kind = completionKind(kindName);
  return {
    label,
    ...(kind !== undefined ? { kind } : {}),
    ...(detail !== undefined && detail.length > 0 ? { detail } : {}),
  };
}

export function parseCompletionOutput(
  output: string,
  format: OutputFormat,
): ParseReport<CompletionItem> {
  if (format === 'json') {
    const report = collect(
      parseJsonDocument(output, completionJsonSchema, (value) =>
        ok(value.completions),
      ),
    );
    const values = report.values.flat().flatMap((entry) => {
      const item =
        typeof entry === 'string'
          ? completionItem(entry, undefined, undefined)
          : completionItem(entry.label, entry.kind, entry.detail);
      return item.label.trim().length > 0 ? [item] : [];
    });
    return { values, malformed: report.malformed };
  }

  return collect(
    parseLines<CompletionItem>(output, (fields, raw) => {
      if (fields.length > 3) {
        return malformed(
          raw,
          `expected at most 3 fields, got ${fields.length}`,
        );
      }

      const [label = '', kindName, detail] = fields;
      if (label.trim().length === 0) {
        return malformed(raw, 'empty completion label');
      }
      return ok(completionItem(label, kindName, detail));
    }),
  );
}

export interface DefinitionTarget {
  uri: DocumentUri;
  start: BackendPosition;
  end?: BackendPosition;
}

function targetUri(path: string, cwd: string): DocumentUri {
  if (path.startsWith('file://')) {
    return path;
  }
  return pathToFileURL(isAbsolute(path) ? path : resolve(cwd, path)).toString();
}

/**
 * Decodes definition records. Coordinates stay in the backend convention
 * until the caller has the target document's text; see {@link toLocation}.
 * JSON output is `{file, start, end}` with offsets into the target file.
 */
export function parseDefinitionOutput(
  output: string,
  format: OutputFormat,
  convention: BackendConvention,
  cwd: string,
): ParseReport<DefinitionTarget> {
  if (format === 'json') {
    return collect(
      parseJsonDocument(output, definitionJsonSchema, (value, raw) => {
        if (NON_NAVIGABLE_TARGETS.has(value.file.trim())) {
          return { kind: 'skipped', raw };
        }
        return ok<DefinitionTarget>({
          uri: targetUri(value.file.trim(), cwd),
          start: offsetOf(value.start),
          end: offsetOf(value.end),
        });
      }),
    );
  }

  const width = positionFieldCount(convention);

  return collect(
    parseLines<DefinitionTarget>(output, (fields, raw) => {
      const [path = ''] = fields;
      if (NON_NAVIGABLE_TARGETS.has(path.trim())) {
        return { kind: 'skipped', raw };
      }

      const coordinates = fields.slice(1);
      if (coordinates.length !== width && coordinates.length !== width * 2) {
        return malformed(raw, `expected ${width} or ${width * 2} coordinates`);
      }

      const start = parsePositionFields(
        coordinates.slice(0, width),
        convention,
      );
      const end =
        coordinates.length === width * 2
          ? parsePositionFields(coordinates.slice(width), convention)
          : undefined;
      if (!start || (coordinates.length === width * 2 && !end)) {
        return malformed(raw, 'coordinates must be non-negative integers');
      }

      return ok<DefinitionTarget>({
        uri: targetUri(path.trim(), cwd),
        start,
        ...(end ? { end } : {}),
      });
    }),
  );
}

/** Converts a definition target to protocol coordinates against its text. */
export function toLocation(
  target: DefinitionTarget,
  doc: TextSource,
  convention: BackendConvention,
): Location {
  return {
    uri: target.uri,
    range: rangeFromBackend(
      doc,
      target.start,
      target.end ?? target.start,
      convention,
    ),
  };
}

export interface CheckOutput {
  diagnostics: Diagnostic[];
  hints: InlayHint[];
  malformed: Array<{ raw: string; reason: string }>;
}

type CheckRecord =
  | { type: 'diagnostic'; diagnostic: Diagnostic }
  | { type: 'hint'; hint: InlayHint };

function decodeCheckJson(
  raw: string,
  doc: TextSource,
  convention: BackendConvention,
  source: string,
): LineOutcome<CheckRecord> {
  const decoded = decodeJson(raw, checkJsonSchema);
  if (decoded.kind !== 'ok') {
    return decoded;
  }

  const record = decoded.value;
  if (record.type === 'hint') {
    return ok<CheckRecord>({
      type: 'hint',
      hint: {
        position: fromBackend(doc, offsetOf(record.position.end), convention),
        label: `: ${record.typename}`,
        kind: INLAY_HINT_KIND_TYPE,
      },
    });
  }

  const severity = SEVERITIES[record.severity.trim().toLowerCase()];
  if (severity === undefined) {
    return malformed(raw, `unknown severity '${record.severity}'`);
  }
  return ok<CheckRecord>({
    type: 'diagnostic',
    diagnostic: {
      range: rangeFromBackend(
        doc,
        offsetOf(record.span.start),
        offsetOf(record.span.end),
        convention,
      ),
      severity,
      message: record.message,
      source,
    },
  });
}

/**
 * Line output: `severity TAB start TAB end TAB message` and
 * `inlay TAB position TAB label`. JSON output: one record per line, tagged
 * `diagnostic` (`severity`, `message`, offset `span`) or `hint` (`typename`
 * shown after `position.end`).
 */
export function parseCheckOutput(
  output: string,
  format: OutputFormat,
  doc: TextSource,
  convention: BackendConvention,
  source: string,
): CheckOutput {
  const width = positionFieldCount(convention);

  const report = collect(
    parseLines<CheckRecord>(output, (fields, raw) => {
      if (format === 'json') {
        return decodeCheckJson(raw, doc, convention, source);
      }
      const tag = (fields[0] ?? '').trim().toLowerCase();

      if (tag === INLAY_HINT_TAG) {
        const at = parsePositionFields(fields.slice(1, 1 + width), convention);
        const label = fields.slice(1 + width).join(FIELD_SEPARATOR);
        if (!at) {
          return malformed(raw, 'inlay hint position is not valid');
        }
        if (label.length === 0) {
          return malformed(raw, 'inlay hint has no label');
        }
        return ok<CheckRecord>({
          type: 'hint',
          hint: {
            position: fromBackend(doc, at, convention),
            label,
            kind: INLAY_HINT_KIND_TYPE,
          },
        });
      }

      const severity = SEVERITIES[tag];
      if (severity === undefined) {
        return malformed(raw, `unknown severity '${fields[0] ?? ''}'`);
      }

      const start = parsePositionFields(fields.slice(1, 1 + width), convention);
      const end = parsePositionFields(
        fields.slice(1 + width, 1 + width * 2),
        convention,
      );
      if (!start || !end) {
        return malformed(raw, 'diagnostic range is not valid');
      }

      const message = fields.slice(1 + width * 2).join(FIELD_SEPARATOR);
      if (message.trim().length === 0) {
        return malformed(raw, 'diagnostic has no message');
      }

      return ok<CheckRecord>({
        type: 'diagnostic',
        diagnostic: {
          range: rangeFromBackend(doc, start, end, convention),
          severity,
          message,
          source,
        },
      });
    }),
  );

  const diagnostics: Diagnostic[] = [];
  const hints: InlayHint[] = [];
  for (const record of report.values) {
    if (record.type === 'diagnostic') {
      diagnostics.push(record.diagnostic);
    } else {
      hints.push(record.hint);
    }
  }
  return { diagnostics, hints, malformed: report.malformed };
}
