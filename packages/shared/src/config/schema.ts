import { z } from 'zod';
import { ConfigError } from '../errors';

/**
 * How far and how loosely a hunk may be matched away from its declared position.
 * `patch` itself searches the whole file with a fuzz factor of 2; the radius here
 * bounds the search so that large files stay cheap.
 */
/** Longest delay `setTimeout` accepts; larger values fire after 1ms */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const MAX_SEARCH_RADIUS = 100_000;

export const MatchingConfigSchema = z.object({
  searchRadius: z
    .number()
    .int()
    .min(0)
    .max(MAX_SEARCH_RADIUS)
    .default(1000)
    .describe('Maximum distance in lines between the declared and the matched position'),
  fuzz: z
    .number()
    .int()
    .min(0)
    .max(10)
    .default(2)
    .describe('Leading/trailing context lines that may be ignored when matching'),
  ignoreWhitespace: z
    .boolean()
    .default(false)
    .describe('Compare lines with whitespace runs collapsed and edges trimmed'),
});

export const LoggingConfigSchema = z.object({
  jsonlPath: z.string().optional(),
  verbose: z.boolean().default(false),
});

export const EngineConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  /** Leading path components stripped from header paths (`-p1`) */
  stripLevel: z.number().int().min(0).default(1),
  matching: MatchingConfigSchema.default({}),
  /** `pass-through` applies metadata of binary entries and copies bytes untouched */
  binary: z.enum(['reject', 'pass-through']).default('reject'),
  /** Allow renames, copies and new files to replace an existing target */
  allowOverwrite: z.boolean().default(false),
  /** All files succeed or none are written */
  atomic: z.boolean().default(false),
  /** Apply the patch in reverse (`patch -R`) */
  reverse: z.boolean().default(false),
  timeoutMs: z.number().int().positive().max(MAX_TIMEOUT_MS).default(60_000),
  logging: LoggingConfigSchema.default({}),
});

export type MatchingConfig = z.infer<typeof MatchingConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type EngineConfig = z.infer<typeof EngineConfigSchema>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;

/**
 * Validates a partial configuration and fills in defaults.
 *
 * @throws ConfigError listing every validation issue
 */
export function resolveEngineConfig(input: EngineConfigInput = {}): EngineConfig {
  return parseEngineConfig(input);
}

/**
 * Validates configuration of unknown shape, such as merged YAML documents.
 *
 * @throws ConfigError listing every validation issue
 */
export function parseEngineConfig(value: unknown): EngineConfig {
  const result = EngineConfigSchema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `- ${i.path.join('.')}: ${i.message}`)
      .join('\n');
    throw new ConfigError(`Configuration validation failed:\n${issues}`);
  }
  return result.data;
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = EngineConfigSchema.parse({});
