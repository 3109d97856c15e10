/**
 * Settings for one sender run, loaded from a JSON settings file.
 * @module config
 */

import { promises as fs } from 'fs';
import { parse as parseJsonc, printParseErrorCode } from 'jsonc-parser';
import type { ParseError } from 'jsonc-parser';
import { z } from 'zod';
import { SenderError, errnoCode, toError } from '../errors';

/** Default SMTP port. */
export const DEFAULT_PORT = 25;

/** Default timeout for connections in milliseconds. */
export const DEFAULT_CONNECT_TIMEOUT = 30000;

/** Default idle read timeout in milliseconds. */
export const DEFAULT_READ_TIMEOUT = 60000;

/**
 * Settings schema.
 */
export const settingsSchema = z.object({
  smtpHost: z.string().min(1),
  smtpPort: z.number().int().min(1).max(65535),
  fromAddress: z.string(),
  toAddresses: z.array(z.string()).min(1),
  emlFiles: z.array(z.string()).min(1),
  updateDate: z.boolean().default(true),
  updateMessageId: z.boolean().default(true),
  useParallel: z.boolean().default(false),
  connectTimeout: z.number().int().positive().default(DEFAULT_CONNECT_TIMEOUT),
  readTimeout: z.number().int().nonnegative().default(DEFAULT_READ_TIMEOUT),
});

/**
 * Validated settings. Shared read-only between parallel workers.
 */
export type Settings = Readonly<z.output<typeof settingsSchema>>;

/**
 * Options accepted by {@link createSettings}; optional keys take their defaults.
 */
export type SettingsOptions = z.input<typeof settingsSchema>;

function describeIssue(issue: z.ZodIssue): string {
  if (issue.path.length === 0) {
    return `Invalid type: ${issue.message}`;
  }
  const key = issue.path.join('.');
  if (issue.code === z.ZodIssueCode.invalid_type && issue.received === 'undefined' && issue.path.length === 1) {
    return `${key} key does not exist`;
  }
  return `${key}: Invalid type: ${issue.message}`;
}

/**
 * Validates an already parsed JSON value.
 */
export function validateSettings(value: unknown, file?: string): Settings {
  const result = settingsSchema.safeParse(value);
  if (!result.success) {
    const first = result.error.issues[0];
    const message = first ? describeIssue(first) : 'Invalid settings';
    throw SenderError.settingsInvalid(message, file);
  }
  return result.data;
}

/**
 * Parses settings from JSON text. `//` and `/* *\/` comments are skipped;
 * trailing commas are not accepted.
 */
export function parseSettings(text: string, file?: string): Settings {
  const errors: ParseError[] = [];
  const json: unknown = parseJsonc(text, errors, { disallowComments: false, allowTrailingComma: false });
  const first = errors[0];
  if (first) {
    throw SenderError.settingsInvalid(
      `Invalid JSON: ${printParseErrorCode(first.error)} at offset ${first.offset}`,
      file
    );
  }
  return validateSettings(json, file);
}

/**
 * Loads and validates a settings file.
 */
export async function loadSettings(file: string): Promise<Settings> {
  let text: string;
  try {
    text = await fs.readFile(file, 'utf-8');
  } catch (err) {
    if (errnoCode(err) === 'ENOENT') {
      throw SenderError.settingsInvalid('Json file does not exist', file);
    }
    throw SenderError.settingsInvalid(`Cannot read settings: ${toError(err).message}`, file);
  }
  return parseSettings(text, file);
}

/**
 * Creates validated settings from options.
 */
export function createSettings(options: SettingsOptions): Settings {
  return validateSettings(options);
}

/**
 * Returns a sample settings file, shown in the CLI usage text.
 */
export function makeJsonSample(): string {
  const sample: SettingsOptions = {
    smtpHost: '172.16.3.151',
    smtpPort: DEFAULT_PORT,
    fromAddress: 'a001@example.com',
    toAddresses: ['a001@example.com', 'a002@example.com', 'a003@example.com'],
    emlFiles: ['test1.eml', 'test2.eml', 'test3.eml'],
    updateDate: true,
    updateMessageId: true,
    useParallel: false,
  };
  return JSON.stringify(sample, null, 4);
}
