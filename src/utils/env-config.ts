/**
 * Environment Variable Configuration Utilities
 *
 * Turns a declarative list of environment variable mappings into a nested
 * configuration patch.
 */

/**
 * Defines a mapping between an environment variable and a configuration object path
 */
export interface EnvMapping {
  /** The name of the environment variable to read from */
  envVar: string;
  /** The nested path in the configuration object where the value should be set */
  configPath: string[];
  /** Optional transformation function to process the environment variable value */
  transform?: (value: string) => unknown;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Sets a nested value in an object, creating intermediate objects as needed
 *
 * @example
 * ```typescript
 * const config = {};
 * setNestedValue(config, ['oracle', 'seed'], 7);
 * // Result: { oracle: { seed: 7 } }
 * ```
 */
export function setNestedValue(
  obj: Record<string, unknown>,
  path: string[],
  value: unknown
): Record<string, unknown> {
  if (path.length === 0) {
    return obj;
  }

  let current = obj;

  for (const key of path.slice(0, -1)) {
    const next = current[key];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[key] = created;
      current = created;
    }
  }

  current[path[path.length - 1]] = value;
  return obj;
}

/**
 * Processes an array of environment variable mappings into a configuration object.
 * Unset variables are skipped.
 */
export function processEnvMappings(
  mappings: EnvMapping[],
  env: NodeJS.ProcessEnv = process.env
): Record<string, unknown> {
  const config: Record<string, unknown> = {};

  for (const mapping of mappings) {
    const envValue = env[mapping.envVar];
    if (envValue === undefined || envValue === '') {
      continue;
    }

    const processedValue = mapping.transform ? mapping.transform(envValue) : envValue;
    setNestedValue(config, mapping.configPath, processedValue);
  }

  return config;
}

/**
 * Deep-merges `patch` over `base`. Records merge key by key, everything else
 * (arrays included) is replaced.
 */
export function mergeDeep(base: object, patch: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(base)) {
    result[key] = value;
  }

  for (const [key, value] of Object.entries(patch)) {
    const existing = result[key];
    result[key] = isRecord(existing) && isRecord(value) ? mergeDeep(existing, value) : value;
  }

  return result;
}

/**
 * Common transformation functions for environment variable processing
 */
export const transforms = {
  /** Convert string to integer */
  int: (value: string): number => parseInt(value, 10),

  /** Convert string to boolean (true for 'true', '1', 'yes', 'on', case-insensitive) */
  boolean: (value: string): boolean => {
    const normalized = value.toLowerCase().trim();
    return normalized === 'true' || normalized === '1' || normalized === 'yes' || normalized === 'on';
  },

  /** Lower-case and trim */
  lower: (value: string): string => value.trim().toLowerCase()
};
