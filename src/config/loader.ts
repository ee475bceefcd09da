/**
 * Configuration loader: reads the JSON store config, resolves environment
 * variable placeholders, and validates with Zod.
 */
import { readFile } from 'node:fs/promises';

import { StowageError } from '../core/errors.js';
import type { Result } from '../core/result.js';
import { err, ok } from '../core/result.js';

import { secretStoreConfigSchema } from './schema.js';
import type { StoreConfig } from './types.js';

// ─── Errors ─────────────────────────────────────────────────────

/**
 * Error returned when configuration loading or validation fails.
 */
export class ConfigError extends StowageError {
  constructor(message: string, context?: Record<string, unknown>) {
    super({
      message,
      code: 'CONFIG_ERROR',
      statusCode: 400,
      context,
    });
    this.name = 'ConfigError';
  }
}

// ─── Environment Variable Resolution ────────────────────────────

const ENV_VAR_PATTERN = /^\$\{([A-Z_][A-Z0-9_]*)\}$/;

/**
 * Recursively replaces strings of the exact form `${VAR_NAME}` with the
 * value of that environment variable.
 *
 * @throws ConfigError if a referenced environment variable is not defined
 */
export function resolveEnvVars(obj: unknown): unknown {
  if (typeof obj === 'string') {
    const varName = ENV_VAR_PATTERN.exec(obj)?.[1];
    if (varName === undefined) return obj;

    const value = process.env[varName];
    if (value === undefined) {
      throw new ConfigError(`Environment variable "${varName}" is not defined`, {
        variableName: varName,
      });
    }
    return value;
  }

  if (Array.isArray(obj)) {
    return obj.map((item) => resolveEnvVars(item));
  }

  if (obj !== null && typeof obj === 'object') {
    return Object.fromEntries(
      Object.entries(obj).map(([key, value]) => [key, resolveEnvVars(value)]),
    );
  }

  return obj;
}

// ─── Validation ─────────────────────────────────────────────────

/**
 * Resolves placeholders in an already-decoded config value and validates it.
 */
export function parseStoreConfig(
  raw: unknown,
  context?: Record<string, unknown>,
): Result<StoreConfig, ConfigError> {
  let resolved: unknown;
  try {
    resolved = resolveEnvVars(raw);
  } catch (error) {
    if (error instanceof ConfigError) return err(error);
    throw error;
  }

  const validation = secretStoreConfigSchema.safeParse(resolved);
  if (!validation.success) {
    return err(
      new ConfigError('Configuration validation failed', {
        ...context,
        issues: validation.error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      }),
    );
  }

  return ok(validation.data);
}

// ─── Configuration Loader ───────────────────────────────────────

/**
 * Loads and validates a store configuration file.
 *
 * 1. Reads the JSON file from disk
 * 2. Parses the JSON content
 * 3. Resolves environment variable placeholders
 * 4. Validates against the Zod schema
 */
export async function loadStoreConfig(
  filePath: string,
): Promise<Result<StoreConfig, ConfigError>> {
  let fileContent: string;
  try {
    fileContent = await readFile(filePath, 'utf-8');
  } catch (error) {
    const code =
      error instanceof Error && 'code' in error && typeof error.code === 'string'
        ? error.code
        : undefined;
    if (code === 'ENOENT') {
      return err(
        new ConfigError(`Configuration file not found: ${filePath}`, {
          filePath,
          errorCode: code,
        }),
      );
    }
    return err(
      new ConfigError(`Failed to read configuration file: ${filePath}`, {
        filePath,
        errorCode: code,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(fileContent);
  } catch {
    return err(new ConfigError('Invalid JSON in configuration file', { filePath }));
  }

  return parseStoreConfig(parsed, { filePath });
}
