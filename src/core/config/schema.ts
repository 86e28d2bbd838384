/**
 * Zod schema for `.canon/config.yaml`.
 */
import { z } from 'zod';

/**
 * Makes an object field optional and fills in the inner defaults when it is
 * missing. `.default({})` skips inner defaults for object schemas, so the
 * value is preprocessed instead. Both undefined and null count as missing.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Identifiers of the built-in checks, in canonical run order. */
export const CHECK_IDS = [
  'rest',
  'openapi',
  'graphql',
  'proto',
  'markdown',
  'sphinx',
  'access-level',
  'formatting',
] as const;

export const CheckIdSchema = z.enum(CHECK_IDS);

/** External collaborators the checks shell out to. */
export const TOOL_NAMES = ['rstcheck', 'swagger-cli', 'protoc', 'markdownlint', 'sphinx-build'] as const;

export const ToolNameSchema = z.enum(TOOL_NAMES);

/** Conventional documentation locations, relative to the project root. */
export const PathsSchema = z.object({
  docs: z.string().default('docs'),
  rest_source: z.string().default('docs/source'),
  sphinx_build: z.string().default('docs/build'),
  decisions: z.string().default('docs/decisions'),
  changelog: z.string().default('CHANGELOG.md'),
  openapi: z.string().default('api-specs'),
  graphql: z.string().default('graphql'),
  proto: z.string().default('proto'),
});

/** Override for one external tool. */
export const ToolSettingsSchema = z.object({
  /** Executable name or path */
  command: z.string().optional(),
  /** Arguments placed before the ones the check passes */
  args: z.array(z.string()).default([]),
});

export const ToolsSchema = z.object({
  rstcheck: withDefaults(ToolSettingsSchema),
  'swagger-cli': withDefaults(ToolSettingsSchema),
  protoc: withDefaults(ToolSettingsSchema),
  markdownlint: withDefaults(ToolSettingsSchema),
  'sphinx-build': withDefaults(ToolSettingsSchema),
});

const CheckToggleSchema = z.object({
  enabled: z.boolean().default(true),
});

export const ChecksSchema = z.object({
  rest: withDefaults(CheckToggleSchema),
  openapi: withDefaults(CheckToggleSchema),
  graphql: withDefaults(CheckToggleSchema),
  proto: withDefaults(CheckToggleSchema),
  markdown: withDefaults(CheckToggleSchema),
  sphinx: withDefaults(CheckToggleSchema),
  'access-level': withDefaults(CheckToggleSchema),
  formatting: withDefaults(CheckToggleSchema),
});

/** The four distribution tiers of the access-level taxonomy. */
export const AccessLevelSchema = z.enum(['Public', 'Internal', 'Restricted', 'Confidential']);

export const AccessLevelSettingsSchema = z.object({
  /** Text every reST document banner must contain */
  marker: z.string().min(1).default('DOCUMENTATION - Level'),
});

/** An additional forbidden pattern for the formatting check. */
export const ForbiddenPatternSchema = z.object({
  name: z.string().min(1),
  /** Regular expression source, compiled with the `u` flag */
  pattern: z.string().min(1).refine(isValidRegex, { message: 'Invalid regular expression' }),
  message: z.string().optional(),
});

export const FormattingSettingsSchema = z.object({
  forbid_emoji: z.boolean().default(true),
  forbid_em_dash: z.boolean().default(true),
  patterns: z.array(ForbiddenPatternSchema).default([]),
});

/** Exit codes configuration. */
export const ExitCodesSchema = z.object({
  success: z.number().int().default(0),
  error: z.number().int().default(1),
  warning_only: z.number().int().default(0),
});

export const ValidationSettingsSchema = z.object({
  fail_on_warning: z.boolean().default(false),
  /** Per-invocation limit for an external tool */
  tool_timeout_ms: z.number().int().min(1000).default(120000),
  exit_codes: withDefaults(ExitCodesSchema),
});

export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  paths: withDefaults(PathsSchema),
  tools: withDefaults(ToolsSchema),
  checks: withDefaults(ChecksSchema),
  access_level: withDefaults(AccessLevelSettingsSchema),
  formatting: withDefaults(FormattingSettingsSchema),
  validation: withDefaults(ValidationSettingsSchema),
});

/** Schema for the file as read: an empty document counts as `{}`. */
export const ConfigFileSchema = withDefaults(ConfigSchema);

export type CheckId = z.infer<typeof CheckIdSchema>;
export type ToolName = z.infer<typeof ToolNameSchema>;
export type AccessLevel = z.infer<typeof AccessLevelSchema>;
export type PathsConfig = z.infer<typeof PathsSchema>;
export type ToolSettings = z.infer<typeof ToolSettingsSchema>;
export type ForbiddenPattern = z.infer<typeof ForbiddenPatternSchema>;
export type FormattingSettings = z.infer<typeof FormattingSettingsSchema>;
export type ExitCodes = z.infer<typeof ExitCodesSchema>;
export type Config = z.infer<typeof ConfigSchema>;

function isValidRegex(source: string): boolean {
  try {
    new RegExp(source, 'u');
    return true;
  } catch {
    return false;
  }
}
