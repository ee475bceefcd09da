/**
 * Serving certificate for the admission webhook. The API server only
 * calls webhooks over HTTPS.
 */
import { readFile } from 'node:fs/promises';

import type { Result } from '../core/result.js';
import { err, ok } from '../core/result.js';

import { ConfigError } from './loader.js';

export interface TlsFiles {
  cert: Buffer;
  key: Buffer;
}

export interface TlsFilePaths {
  certFile?: string;
  keyFile?: string;
}

/**
 * Reads the PEM certificate and key. Resolves to `undefined` when neither
 * path is set, which leaves the server on plain HTTP.
 */
export async function loadTlsFiles(
  paths: TlsFilePaths,
): Promise<Result<TlsFiles | undefined, ConfigError>> {
  const { certFile, keyFile } = paths;
  if (!certFile && !keyFile) return ok(undefined);
  if (!certFile || !keyFile) {
    return err(
      new ConfigError('TLS certificate and key must be configured together', {
        certFile,
        keyFile,
      }),
    );
  }

  try {
    const [cert, key] = await Promise.all([readFile(certFile), readFile(keyFile)]);
    return ok({ cert, key });
  } catch (error) {
    return err(
      new ConfigError('Failed to read TLS files', {
        certFile,
        keyFile,
        errorMessage: error instanceof Error ? error.message : String(error),
      }),
    );
  }
}
