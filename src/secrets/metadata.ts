/**
 * Decoding of the side-channel metadata document attached to a Secret.
 */
import { z } from 'zod';
import { ParseMetadataError } from './errors.js';
import type { SecretMetadata } from './types.js';

/** Unknown fields are dropped; `null` counts as absent. */
export const secretMetadataSchema = z
  .object({
    labels: z.record(z.string()).nullish(),
    annotations: z.record(z.string()).nullish(),
    type: z.string().nullish(),
  })
  .nullable();

/**
 * Parse a metadata buffer.
 * Absent or zero-length input yields an empty document.
 *
 * @throws ParseMetadataError when the bytes are not JSON or do not match the schema
 */
export function parseSecretMetadata(raw: Buffer | undefined): SecretMetadata {
  if (raw === undefined || raw.length === 0) return {};

  let decoded: unknown;
  try {
    decoded = JSON.parse(raw.toString('utf8'));
  } catch (error) {
    throw new ParseMetadataError(error);
  }

  const validation = secretMetadataSchema.safeParse(decoded);
  if (!validation.success) {
    throw new ParseMetadataError(validation.error, {
      issues: validation.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    });
  }

  const document = validation.data ?? {};
  const metadata: SecretMetadata = {};
  if (document.labels) metadata.labels = document.labels;
  if (document.annotations) metadata.annotations = document.annotations;
  if (document.type) metadata.type = document.type;
  return metadata;
}
