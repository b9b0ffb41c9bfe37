/**
 * Environment-driven defaults for the CLI entry points.
 *
 * Values come from process.env (the CLIs load `.env` through dotenv first);
 * command-line flags override them.
 */

export interface MapperConfig {
  strict: boolean;                  // unknown mapping originals are fatal
  skipHeader: boolean;              // treat the first CSV row as a header
  reorderNameQualifiers: boolean;   // "First name" → "Name First" in suggestions
  includeCalculated: boolean;       // calculated fields are rename candidates
  quiet: boolean;
}

export const DEFAULT_CONFIG: Readonly<MapperConfig> = {
  strict: false,
  skipHeader: false,
  reorderNameQualifiers: false,
  includeCalculated: true,
  quiet: false
};

const ENV_KEYS: ReadonlyArray<[keyof MapperConfig, string]> = [
  ['strict', 'MAPPER_STRICT'],
  ['skipHeader', 'MAPPER_SKIP_HEADER'],
  ['reorderNameQualifiers', 'MAPPER_REORDER_NAMES'],
  ['includeCalculated', 'MAPPER_INCLUDE_CALCULATED'],
  ['quiet', 'MAPPER_QUIET']
];

export function parseBooleanLike(value: unknown): boolean | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'boolean') return value;
  const str = String(value).trim().toLowerCase();
  if (str === '') return undefined;
  if (['true', '1', 'yes', 'y', 'on'].includes(str)) return true;
  if (['false', '0', 'no', 'n', 'off'].includes(str)) return false;
  return undefined;
}

/**
 * Resolve configuration from an environment map.
 *
 * @throws Error when a variable is set to something that is not boolean-like
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): MapperConfig {
  const config: MapperConfig = { ...DEFAULT_CONFIG };

  for (const [key, variable] of ENV_KEYS) {
    const raw = env[variable];
    if (raw === undefined || raw.trim() === '') continue;

    const parsed = parseBooleanLike(raw);
    if (parsed === undefined) {
      throw new Error(`Invalid value for ${variable}: "${raw}" (expected true/false)`);
    }
    config[key] = parsed;
  }

  return config;
}

/**
 * Apply CLI flag overrides on top of a loaded config.
 * Flags left undefined keep the configured value.
 */
export function withOverrides(config: MapperConfig, overrides: Partial<MapperConfig>): MapperConfig {
  const merged: MapperConfig = { ...config };
  for (const [key] of ENV_KEYS) {
    const value = overrides[key];
    if (value !== undefined) {
      merged[key] = value;
    }
  }
  return merged;
}
