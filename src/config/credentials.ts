/**
 * API credential resolution.
 *
 * Precedence, decided once per run and passed down:
 *   explicit argument > GEMINI_API_KEY environment variable > persisted key file > interactive prompt
 *
 * A candidate that fails normalisation or the length check falls through to the
 * next source. The resolved key is never logged.
 */

import * as fs from 'fs';
import * as path from 'path';
import { atomicWriteFileSync } from '../security';
import { LoggerLike } from '../common/logger';
import { ConfigurationError } from '../common/errors';

export const API_KEY_ENV_VAR = 'GEMINI_API_KEY';
export const MIN_API_KEY_LENGTH = 30;

export type CredentialSource = 'argument' | 'environment' | 'file' | 'prompt';

export interface ResolvedCredential {
  apiKey: string;
  source: CredentialSource;
}

export interface CredentialOptions {
  explicitKey?: string;
  env?: NodeJS.ProcessEnv;
  keyFile: string;
  /** Asked only when every other source is empty or invalid */
  prompt?: () => Promise<string | null>;
  persistPrompted?: boolean;
}

export function normalizeApiKey(raw: string): string {
  return raw.replace(/[^a-zA-Z0-9\-._]/g, '').trim();
}

export function isValidApiKey(key: string): boolean {
  return key.length >= MIN_API_KEY_LENGTH;
}

export function maskApiKey(key: string): string {
  if (key.length <= 5) {
    return '*'.repeat(key.length);
  }
  return key.slice(0, 5) + '*'.repeat(key.length - 5);
}

function readKeyFile(keyFile: string, logger: LoggerLike): string | null {
  if (!fs.existsSync(keyFile)) {
    return null;
  }
  try {
    const stats = fs.lstatSync(keyFile);
    if (stats.isSymbolicLink()) {
      logger.warn('Key file is a symlink, ignoring it', { path: keyFile });
      return null;
    }
    return fs.readFileSync(keyFile, 'utf8');
  } catch (error) {
    logger.warn('Could not read key file, trying next credential source', { path: keyFile }, error);
    return null;
  }
}

export async function resolveApiKey(options: CredentialOptions, logger: LoggerLike): Promise<ResolvedCredential> {
  const env = options.env ?? process.env;

  const candidates: Array<{ source: CredentialSource; read: () => string | null | undefined }> = [
    { source: 'argument', read: () => options.explicitKey },
    { source: 'environment', read: () => env[API_KEY_ENV_VAR] },
    { source: 'file', read: () => readKeyFile(options.keyFile, logger) }
  ];

  for (const candidate of candidates) {
    const raw = candidate.read();
    if (!raw) {
      continue;
    }
    const key = normalizeApiKey(raw);
    if (isValidApiKey(key)) {
      logger.info('API key resolved', { source: candidate.source });
      return { apiKey: key, source: candidate.source };
    }
    logger.warn('Ignoring invalid API key candidate', { source: candidate.source, length: key.length });
  }

  if (options.prompt) {
    const raw = await options.prompt();
    const key = raw ? normalizeApiKey(raw) : '';
    if (isValidApiKey(key)) {
      if (options.persistPrompted !== false) {
        persistApiKey(options.keyFile, key);
        logger.info('API key saved', { path: options.keyFile });
      }
      return { apiKey: key, source: 'prompt' };
    }
    logger.warn('Prompted API key rejected', { length: key.length });
  }

  throw new ConfigurationError(
    `No valid API key found (argument, ${API_KEY_ENV_VAR}, ${options.keyFile} or prompt)`
  );
}

export function persistApiKey(keyFile: string, key: string): void {
  const dir = path.dirname(path.resolve(keyFile));
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
  atomicWriteFileSync(keyFile, key, 0o600);
}

/** Removes the persisted key; the next resolution falls through to the prompt. */
export function resetApiKey(keyFile: string, logger: LoggerLike): void {
  if (fs.existsSync(keyFile)) {
    fs.unlinkSync(keyFile);
    logger.info('Persisted API key removed', { path: keyFile });
  }
}
