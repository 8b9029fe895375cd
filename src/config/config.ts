import { ZodError } from 'zod';
import { ScanConfig } from '../schemas/config.schema.js';

/**
 * Environment variables consulted by `loadConfig`, keyed by config field.
 */
export const ENV_KEYS = {
  apiBaseUrl: 'EOL_SCAN_API_URL',
  timeoutMs: 'EOL_SCAN_TIMEOUT_MS',
  inputDir: 'EOL_SCAN_INPUT_DIR',
  outputDir: 'EOL_SCAN_OUTPUT_DIR',
  logLevel: 'EOL_SCAN_LOG_LEVEL',
} as const satisfies Record<keyof ScanConfig, string>;

/** Raw values from flags or callers; coerced and validated by `ScanConfig`. */
export type ConfigOverrides = Partial<Record<keyof ScanConfig, string | number>>;

export type LoadConfigResult =
  | { success: true; config: ScanConfig }
  | { success: false; error: string; issues?: unknown };

/**
 * Resolve the run configuration.
 *
 * Precedence, lowest first: schema defaults, environment, explicit overrides
 * (CLI flags). Blank environment values are ignored.
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
): LoadConfigResult {
  const merged: Record<string, unknown> = {};

  for (const [field, envKey] of Object.entries(ENV_KEYS)) {
    const value = env[envKey]?.trim();
    if (value) merged[field] = value;
  }

  for (const [field, value] of Object.entries(overrides)) {
    if (value !== undefined) merged[field] = value;
  }

  try {
    return { success: true, config: ScanConfig.parse(merged) };
  } catch (err) {
    if (err instanceof ZodError) {
      return {
        success: false,
        error: `Invalid configuration: ${err.errors
          .map((e) => `${e.path.join('.') || 'config'}: ${e.message}`)
          .join(', ')}`,
        issues: err.errors,
      };
    }
    return { success: false, error: `Invalid configuration: ${String(err)}` };
  }
}
