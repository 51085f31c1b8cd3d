/**
 * Remediation Agent Security Module
 *
 * Provides:
 * - Schema validation for configuration and telemetry inputs
 * - Static safety validation of generated remediation scripts
 * - Log sanitization
 * - Atomic, permission-restricted file writes
 * - Content digests binding a safety report to the script it approved
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';

export {
  validateScript,
  splitCommandSegments,
  scoreScriptRisk,
  getRiskLevel,
  EPHEMERAL_PATH_PREFIXES,
} from './script-validator';

export { computeScriptDigest } from './script-digest';

// ===========================================
// SCHEMA VALIDATION (lightweight Zod-like)
// ===========================================

export type ValidationResult<T> =
  | { success: true; data: T }
  | { success: false; error: string };

export interface Validator<T> {
  parse(input: unknown): T;
  safeParse(input: unknown): ValidationResult<T>;
}

class StringValidator implements Validator<string> {
  private minLength?: number;
  private maxLength?: number;
  private pattern?: RegExp;
  private allowedValues?: Set<string>;

  min(length: number): StringValidator {
    const v = new StringValidator();
    Object.assign(v, this);
    v.minLength = length;
    return v;
  }

  max(length: number): StringValidator {
    const v = new StringValidator();
    Object.assign(v, this);
    v.maxLength = length;
    return v;
  }

  regex(pattern: RegExp): StringValidator {
    const v = new StringValidator();
    Object.assign(v, this);
    v.pattern = pattern;
    return v;
  }

  enum(values: readonly string[]): StringValidator {
    const v = new StringValidator();
    Object.assign(v, this);
    v.allowedValues = new Set(values);
    return v;
  }

  parse(input: unknown): string {
    const result = this.safeParse(input);
    if (!result.success) throw new Error(result.error);
    return result.data;
  }

  safeParse(input: unknown): ValidationResult<string> {
    if (typeof input !== 'string') {
      return { success: false, error: 'Expected string' };
    }
    if (this.minLength !== undefined && input.length < this.minLength) {
      return { success: false, error: `String must be at least ${this.minLength} characters` };
    }
    if (this.maxLength !== undefined && input.length > this.maxLength) {
      return { success: false, error: `String must be at most ${this.maxLength} characters` };
    }
    if (this.pattern && !this.pattern.test(input)) {
      return { success: false, error: 'String does not match required pattern' };
    }
    if (this.allowedValues && !this.allowedValues.has(input)) {
      return { success: false, error: `String must be one of: ${[...this.allowedValues].join(', ')}` };
    }
    return { success: true, data: input };
  }
}

class NumberValidator implements Validator<number> {
  private minValue?: number;
  private maxValue?: number;
  private integerOnly = false;

  min(value: number): NumberValidator {
    const v = new NumberValidator();
    Object.assign(v, this);
    v.minValue = value;
    return v;
  }

  max(value: number): NumberValidator {
    const v = new NumberValidator();
    Object.assign(v, this);
    v.maxValue = value;
    return v;
  }

  int(): NumberValidator {
    const v = new NumberValidator();
    Object.assign(v, this);
    v.integerOnly = true;
    return v;
  }

  parse(input: unknown): number {
    const result = this.safeParse(input);
    if (!result.success) throw new Error(result.error);
    return result.data;
  }

  safeParse(input: unknown): ValidationResult<number> {
    if (typeof input !== 'number' || isNaN(input)) {
      return { success: false, error: 'Expected number' };
    }
    if (this.integerOnly && !Number.isInteger(input)) {
      return { success: false, error: 'Expected integer' };
    }
    if (this.minValue !== undefined && input < this.minValue) {
      return { success: false, error: `Number must be at least ${this.minValue}` };
    }
    if (this.maxValue !== undefined && input > this.maxValue) {
      return { success: false, error: `Number must be at most ${this.maxValue}` };
    }
    return { success: true, data: input };
  }
}

class BooleanValidator implements Validator<boolean> {
  parse(input: unknown): boolean {
    const result = this.safeParse(input);
    if (!result.success) throw new Error(result.error);
    return result.data;
  }

  safeParse(input: unknown): ValidationResult<boolean> {
    if (typeof input !== 'boolean') {
      return { success: false, error: 'Expected boolean' };
    }
    return { success: true, data: input };
  }
}

class ArrayValidator<T> implements Validator<T[]> {
  private maxItems?: number;

  constructor(private item: Validator<T>) {}

  max(count: number): ArrayValidator<T> {
    const v = new ArrayValidator(this.item);
    v.maxItems = count;
    return v;
  }

  parse(input: unknown): T[] {
    const result = this.safeParse(input);
    if (!result.success) throw new Error(result.error);
    return result.data;
  }

  safeParse(input: unknown): ValidationResult<T[]> {
    if (!Array.isArray(input)) {
      return { success: false, error: 'Expected array' };
    }
    if (this.maxItems !== undefined && input.length > this.maxItems) {
      return { success: false, error: `Array must have at most ${this.maxItems} items` };
    }
    const items: T[] = [];
    for (let i = 0; i < input.length; i++) {
      const itemResult = this.item.safeParse(input[i]);
      if (!itemResult.success) {
        return { success: false, error: `[${i}]: ${itemResult.error}` };
      }
      items.push(itemResult.data);
    }
    return { success: true, data: items };
  }
}

class ObjectValidator<T extends Record<string, unknown>> implements Validator<T> {
  constructor(private shape: { [K in keyof T]: Validator<T[K]> }) {}

  parse(input: unknown): T {
    const result = this.safeParse(input);
    if (!result.success) throw new Error(result.error);
    return result.data;
  }

  safeParse(input: unknown): ValidationResult<T> {
    if (typeof input !== 'object' || input === null || Array.isArray(input)) {
      return { success: false, error: 'Expected object' };
    }

    const fields = new Map<string, unknown>(Object.entries(input));
    const shape: Record<string, Validator<unknown>> = this.shape;
    const result: Record<string, unknown> = {};
    for (const [key, validator] of Object.entries(shape)) {
      const fieldResult = validator.safeParse(fields.get(key));
      if (!fieldResult.success) {
        return { success: false, error: `${key}: ${fieldResult.error}` };
      }
      if (fieldResult.data !== undefined) {
        result[key] = fieldResult.data;
      }
    }

    return { success: true, data: result as T };
  }
}

class OptionalValidator<T> implements Validator<T | undefined> {
  constructor(private inner: Validator<T>) {}

  parse(input: unknown): T | undefined {
    const result = this.safeParse(input);
    if (!result.success) throw new Error(result.error);
    return result.data;
  }

  safeParse(input: unknown): ValidationResult<T | undefined> {
    if (input === undefined || input === null) {
      return { success: true, data: undefined };
    }
    return this.inner.safeParse(input);
  }
}

// Schema factory
export const z = {
  string: () => new StringValidator(),
  number: () => new NumberValidator(),
  boolean: () => new BooleanValidator(),
  array: <T>(item: Validator<T>) => new ArrayValidator(item),
  object: <T extends Record<string, unknown>>(shape: { [K in keyof T]: Validator<T[K]> }) =>
    new ObjectValidator(shape),
  optional: <T>(validator: Validator<T>) => new OptionalValidator(validator),
};

// ===========================================
// LOG SANITIZATION
// ===========================================

const SENSITIVE_PATTERNS = [
  // API keys and tokens
  { pattern: /Bearer\s+[A-Za-z0-9\-_.]+/gi, replacement: 'Bearer [REDACTED]' },
  { pattern: /api[_-]?key["']?\s*[:=]\s*["']?[A-Za-z0-9\-_.]+/gi, replacement: 'apiKey: [REDACTED]' },
  { pattern: /x-goog-api-key["']?\s*[:=]\s*["']?[A-Za-z0-9\-_.]+/gi, replacement: 'x-goog-api-key: [REDACTED]' },
  { pattern: /\bAIza[0-9A-Za-z\-_]{20,}/g, replacement: '[REDACTED_API_KEY]' },
  { pattern: /([?&]key=)[A-Za-z0-9\-_.]+/gi, replacement: '$1[REDACTED]' },

  // Passwords and secrets
  { pattern: /password["']?\s*[:=]\s*["']?[^"'\s,}]+/gi, replacement: 'password: [REDACTED]' },
  { pattern: /secret["']?\s*[:=]\s*["']?[^"'\s,}]+/gi, replacement: 'secret: [REDACTED]' },

  // Email addresses
  { pattern: /[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}/g, replacement: '[EMAIL_REDACTED]' },

  // Windows paths with usernames
  { pattern: /C:\\Users\\[^\\\s"']+/gi, replacement: 'C:\\Users\\[USER]' },
];

const SENSITIVE_KEYS = new Set([
  'apikey', 'api_key', 'password', 'secret', 'token', 'authorization', 'credential', 'x-goog-api-key'
]);

export function sanitizeLogData(data: unknown): unknown {
  if (typeof data === 'string') {
    let sanitized = data;
    for (const { pattern, replacement } of SENSITIVE_PATTERNS) {
      sanitized = sanitized.replace(pattern, replacement);
    }
    return sanitized;
  }

  if (Array.isArray(data)) {
    return data.map(item => sanitizeLogData(item));
  }

  if (typeof data === 'object' && data !== null) {
    const sanitized: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(data)) {
      if (SENSITIVE_KEYS.has(key.toLowerCase())) {
        sanitized[key] = '[REDACTED]';
      } else {
        sanitized[key] = sanitizeLogData(value);
      }
    }
    return sanitized;
  }

  return data;
}

// ===========================================
// SECURE FILE OPERATIONS
// ===========================================

/**
 * Atomic file write - writes to temp file first, then renames
 */
export function atomicWriteFileSync(filePath: string, data: string, mode: number = 0o600): void {
  const dir = path.dirname(filePath);
  const tempPath = path.join(dir, `.${path.basename(filePath)}.tmp.${crypto.randomBytes(8).toString('hex')}`);

  try {
    fs.writeFileSync(tempPath, data, { encoding: 'utf8', mode });
    fs.renameSync(tempPath, filePath);
  } catch (error) {
    if (fs.existsSync(tempPath)) {
      fs.unlinkSync(tempPath);
    }
    throw error;
  }
}

/**
 * Safe JSON parse with schema validation
 */
export function safeParseJSON<T>(
  jsonString: string,
  validator: Validator<T>
): ValidationResult<T> {
  try {
    const parsed: unknown = JSON.parse(jsonString);
    return validator.safeParse(parsed);
  } catch (error) {
    return { success: false, error: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}` };
  }
}

/**
 * Safe file read with JSON validation
 */
export function safeReadJSONFile<T>(
  filePath: string,
  validator: Validator<T>
): ValidationResult<T> {
  try {
    if (!fs.existsSync(filePath)) {
      return { success: false, error: 'File not found' };
    }

    const stats = fs.lstatSync(filePath);
    if (stats.isSymbolicLink()) {
      return { success: false, error: 'Symlinks not allowed' };
    }

    const content = fs.readFileSync(filePath, 'utf8');
    return safeParseJSON(content, validator);
  } catch (error) {
    return { success: false, error: `File read error: ${error instanceof Error ? error.message : String(error)}` };
  }
}
