import { closeSync, fsyncSync, mkdirSync, openSync, readFileSync, renameSync, rmSync, statSync, writeFileSync } from 'fs';
import { basename, dirname, join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { ConfigParseError, ConfigStoreError, ConfigValidationError, ConfigWriteError, describeError } from './errors';

const INDENT = '  ';

export const RESERVED_KEY = '__proto__';

function isMissingFileError(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

// Object parsing drops an own `__proto__` key; documents holding one are refused.
function findReservedKeys(value: unknown, path: string[] = []): string[] {
  if (Array.isArray(value)) {
    const items: unknown[] = value;
    return items.flatMap((item, index) => findReservedKeys(item, [...path, String(index)]));
  }
  if (typeof value !== 'object' || value === null) {
    return [];
  }
  const entries: [string, unknown][] = Object.entries(value);
  return entries.flatMap(([key, item]) => {
    const nested = findReservedKeys(item, [...path, key]);
    if (key !== RESERVED_KEY) {
      return nested;
    }
    const location = path.length > 0 ? path.join('.') : '(root)';
    return [`${location}: Key '${RESERVED_KEY}' is not supported`, ...nested];
  });
}

// Non-ASCII characters are written as \uXXXX escapes, matching the files the host already has.
function encodeString(value: string): string {
  return JSON.stringify(value).replace(
    /[\u0080-\uffff]/g,
    (char) => `\\u${char.charCodeAt(0).toString(16).padStart(4, '0')}`
  );
}

/**
 * Canonical JSON text: keys sorted at every level, two-space indentation,
 * ASCII-only output and no trailing newline. Properties whose value is
 * `undefined` are left out, as `JSON.stringify` does.
 *
 * Numbers are written the way JavaScript prints them, so `1.0` comes back as
 * `1` and integers beyond `Number.MAX_SAFE_INTEGER` lose precision.
 */
export function serializeJson(value: unknown, depth = 0): string {
  if (typeof value === 'string') {
    return encodeString(value);
  }
  if (value === null || typeof value === 'number' || typeof value === 'boolean') {
    return JSON.stringify(value);
  }
  if (typeof value !== 'object') {
    throw new TypeError(`Cannot serialize a value of type ${typeof value}`);
  }

  const padding = INDENT.repeat(depth + 1);
  const closing = INDENT.repeat(depth);

  if (Array.isArray(value)) {
    const items: unknown[] = value;
    if (items.length === 0) {
      return '[]';
    }
    const lines = items.map((item) => `${padding}${serializeJson(item === undefined ? null : item, depth + 1)}`);
    return `[\n${lines.join(',\n')}\n${closing}]`;
  }

  const entries: [string, unknown][] = Object.entries(value);
  const defined = entries
    .filter(([, item]) => item !== undefined)
    .sort(([left], [right]) => (left < right ? -1 : left > right ? 1 : 0));
  if (defined.length === 0) {
    return '{}';
  }
  const lines = defined.map(([key, item]) => `${padding}${encodeString(key)}: ${serializeJson(item, depth + 1)}`);
  return `{\n${lines.join(',\n')}\n${closing}}`;
}

/**
 * Reads and validates a JSON file. Resolves to `undefined` when the file does not exist.
 */
export function loadJson<T>(filePath: string, schema: z.ZodType<T>): T | undefined {
  let text: string;
  try {
    text = readFileSync(filePath, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      return undefined;
    }
    throw new ConfigStoreError(`Could not read ${filePath}: ${describeError(error)}`, filePath, { cause: error });
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    throw new ConfigParseError(`Malformed JSON in ${filePath}: ${describeError(error)}`, filePath, { cause: error });
  }

  const reserved = findReservedKeys(data);
  if (reserved.length > 0) {
    throw new ConfigValidationError(filePath, reserved);
  }

  const result = schema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => {
      const location = issue.path.length > 0 ? issue.path.join('.') : '(root)';
      return `${location}: ${issue.message}`;
    });
    throw new ConfigValidationError(filePath, issues);
  }
  return result.data;
}

function currentMode(filePath: string): number | undefined {
  try {
    return statSync(filePath).mode & 0o777;
  } catch (error) {
    if (isMissingFileError(error)) {
      return undefined;
    }
    throw error;
  }
}

/**
 * Replaces `filePath` with the canonical serialization of `value`.
 *
 * The text goes to a temporary file next to the target which is then renamed
 * over it, so readers see either the old or the new document and a failed
 * write leaves the old one in place.
 */
export function saveJson(filePath: string, value: unknown): void {
  const directory = dirname(filePath);
  const tempPath = join(directory, `.${basename(filePath)}.${uuidv4()}.tmp`);

  try {
    const text = serializeJson(value);
    mkdirSync(directory, { recursive: true });
    const mode = currentMode(filePath) ?? 0o644;

    const fd = openSync(tempPath, 'wx', mode);
    try {
      writeFileSync(fd, text, 'utf-8');
      fsyncSync(fd);
    } finally {
      closeSync(fd);
    }
    renameSync(tempPath, filePath);
  } catch (error) {
    rmSync(tempPath, { force: true });
    throw new ConfigWriteError(`Could not write ${filePath}: ${describeError(error)}`, filePath, { cause: error });
  }
}
