import { z } from 'zod';

/** Section name used for workspace/configuration and didChangeConfiguration. */
export const SETTINGS_SECTION = 'clibridge';

const flagsSchema = z.object({
  hover: z.string().min(1).default('--ide-hover'),
  completion: z.string().min(1).default('--ide-complete'),
  definition: z.string().min(1).default('--ide-goto-def'),
  check: z.string().min(1).default('--ide-check'),
});

const positionSchema = z.object({
  style: z.enum(['lineColumn', 'offset']).default('offset'),
  lineBase: z.union([z.literal(0), z.literal(1)]).default(1),
  columnBase: z.union([z.literal(0), z.literal(1)]).default(0),
  columnUnit: z.enum(['utf16', 'codepoint', 'byte']).default('byte'),
});

const diagnosticsSchema = z.object({
  onChange: z.enum(['eager', 'debounce', 'throttle', 'off']).default('debounce'),
  delayMs: z.number().int().nonnegative().default(250),
});

const hintsSchema = z.object({
  showInferredTypes: z.boolean().default(true),
});

export const adapterSettingsSchema = z.object({
  executablePath: z.string().min(1).default('nu'),
  extraArgs: z.array(z.string()).default([]),
  includeDirs: z.array(z.string()).default([]),
  maxInvocationTimeMs: z.number().int().positive().default(10_000),
  maxNumberOfProblems: z.number().int().positive().default(1000),
  /**
   * `json`: one JSON document per answer, JSON lines for check.
   * `lines`: TAB-separated records.
   */
  output: z.enum(['json', 'lines']).default('json'),
  flags: flagsSchema.default({}),
  position: positionSchema.default({}),
  diagnostics: diagnosticsSchema.default({}),
  hints: hintsSchema.default({}),
});

export type AdapterSettings = z.infer<typeof adapterSettingsSchema>;
export type BackendConvention = AdapterSettings['position'];
export type OutputFormat = AdapterSettings['output'];
export type DiagnosticsPolicy = AdapterSettings['diagnostics'];

export interface ResolvedSettings {
  settings: AdapterSettings;
  issues: string[];
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const formatIssue = (issue: z.ZodIssue): string => {
  const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return `${SETTINGS_SECTION}.${path}: ${issue.message}`;
};

export const defaultSettings = (): AdapterSettings =>
  adapterSettingsSchema.parse({});

/**
 * Validates client-supplied settings. Top-level fields that fail validation
 * fall back to their defaults; the rest are kept.
 */
export function resolveSettings(input: unknown): ResolvedSettings {
  const parsed = adapterSettingsSchema.safeParse(input ?? {});
  if (parsed.success) {
    return { settings: parsed.data, issues: [] };
  }

  const issues = parsed.error.issues.map(formatIssue);
  const invalidKeys = new Set(
    parsed.error.issues.map((issue) => String(issue.path[0] ?? '')),
  );
  const kept = isRecord(input)
    ? Object.fromEntries(
        Object.entries(input).filter(([key]) => !invalidKeys.has(key)),
      )
    : {};

  const retry = adapterSettingsSchema.safeParse(kept);
  return {
    settings: retry.success ? retry.data : defaultSettings(),
    issues,
  };
}

/** Pulls our section out of a didChangeConfiguration `settings` payload. */
export function extractSection(settings: unknown): unknown {
  if (!isRecord(settings)) {
    return undefined;
  }
  return settings[SETTINGS_SECTION];
}
