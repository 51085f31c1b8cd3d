import * as crypto from 'crypto';

/**
 * SHA-256 of a script's exact text. A SafetyReport carries the digest of the
 * script it was computed for; execution refuses any script whose digest differs.
 */
export function computeScriptDigest(scriptText: string): string {
  return crypto.createHash('sha256').update(scriptText, 'utf8').digest('hex');
}
