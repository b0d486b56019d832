import fs from 'fs/promises';
import { z } from 'zod';
import type { ServiceAccountCredentials } from '../types/config';
import { CredentialsError, errorMessage, isNotFoundError } from '../utils/errors';

const PEM_PRIVATE_KEY = /-----BEGIN (?:RSA |EC )?PRIVATE KEY-----[\s\S]+-----END (?:RSA |EC )?PRIVATE KEY-----/;

const CredentialsSchema = z
  .object({
    type: z.literal('service_account').optional(),
    project_id: z.string().min(1, 'project_id is required'),
    client_email: z.string().email('client_email must be an email address'),
    private_key: z.string().regex(PEM_PRIVATE_KEY, 'private_key must be a PEM private key'),
    private_key_id: z.string().optional(),
  })
  .passthrough();

/** Reads and validates a service-account key file before any remote call uses it. */
export async function loadCredentials(filePath: string): Promise<ServiceAccountCredentials> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    throw new CredentialsError(
      isNotFoundError(error)
        ? `Credentials file not found: ${filePath}`
        : `Cannot read credentials file: ${errorMessage(error)}`,
      { details: { file_path: filePath }, cause: error }
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new CredentialsError(`Credentials file is not valid JSON: ${errorMessage(error)}`, {
      details: { file_path: filePath },
      cause: error,
    });
  }

  const parsed = CredentialsSchema.safeParse(json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      field: issue.path.join('.') || '(root)',
      message: issue.message,
    }));
    throw new CredentialsError(
      `Invalid credentials file: ${issues.map((issue) => `${issue.field}: ${issue.message}`).join('; ')}`,
      { details: { file_path: filePath, issues } }
    );
  }

  return parsed.data;
}
