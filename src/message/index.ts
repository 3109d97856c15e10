/**
 * Byte-level rewriting of raw RFC 5322 messages.
 *
 * Only the header/body boundary and the `Date:` and `Message-ID:` fields are
 * inspected; every other byte of the message is passed through untouched.
 * Lines returned by {@link getRawLines} are views into the input buffer, so
 * every function that returns a changed message allocates a new buffer.
 */

import { randomInt } from 'crypto';
import { SenderError } from '../errors';

export const CR = 0x0d;
export const LF = 0x0a;
export const SPACE = 0x20;
export const HTAB = 0x09;
export const CRLF = '\r\n';

/** Blank line separating header and body. */
export const EMPTY_LINE: Buffer = Buffer.from([CR, LF, CR, LF]);

const DATE_FIELD = Buffer.from('Date:');
const MESSAGE_ID_FIELD = Buffer.from('Message-ID:');

const DAYS = ['Sun', 'Mon', 'Tue', 'Wed', 'Thu', 'Fri', 'Sat'];
const MONTHS = ['Jan', 'Feb', 'Mar', 'Apr', 'May', 'Jun', 'Jul', 'Aug', 'Sep', 'Oct', 'Nov', 'Dec'];

const MESSAGE_ID_CHARS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789';
const MESSAGE_ID_LENGTH = 62;

/**
 * Which header fields to regenerate.
 */
export interface UpdateOptions {
  updateDate: boolean;
  updateMessageId: boolean;
}

/**
 * A message split at its first blank line.
 */
export interface SplitMessage {
  header: Buffer;
  body: Buffer;
}

// ---------------------------------------------------------------------------
// Line scanning
// ---------------------------------------------------------------------------

export function findCrIndex(buf: Uint8Array, offset: number): number {
  return buf.indexOf(CR, offset);
}

export function findLfIndex(buf: Uint8Array, offset: number): number {
  return buf.indexOf(LF, offset);
}

/**
 * Returns the offset of every LF byte, in order.
 */
export function findAllLfIndices(buf: Uint8Array): number[] {
  const indices: number[] = [];
  let offset = 0;
  for (;;) {
    const idx = findLfIndex(buf, offset);
    if (idx === -1) {
      return indices;
    }
    indices.push(idx);
    offset = idx + 1;
  }
}

/**
 * Splits a buffer into lines, each ending with its LF (and preceding CR).
 * Bytes after the last LF form one final unterminated line.
 */
export function getRawLines(buf: Buffer): Buffer[] {
  const lines: Buffer[] = [];
  let offset = 0;
  for (const idx of findAllLfIndices(buf)) {
    lines.push(buf.subarray(offset, idx + 1));
    offset = idx + 1;
  }
  if (offset < buf.length) {
    lines.push(buf.subarray(offset));
  }
  return lines;
}

// ---------------------------------------------------------------------------
// Header rewriting
// ---------------------------------------------------------------------------

/**
 * Case-sensitive prefix comparison of a line against a field name with colon.
 */
export function matchHeaderField(line: Uint8Array, field: Uint8Array): boolean {
  if (line.length < field.length) {
    return false;
  }
  for (let i = 0; i < field.length; i++) {
    if (line[i] !== field[i]) {
      return false;
    }
  }
  return true;
}

export function isDateLine(line: Uint8Array): boolean {
  return matchHeaderField(line, DATE_FIELD);
}

export function isMessageIdLine(line: Uint8Array): boolean {
  return matchHeaderField(line, MESSAGE_ID_FIELD);
}

export function isWsp(b: number | undefined): boolean {
  return b === SPACE || b === HTAB;
}

/**
 * True for folding continuation lines.
 */
export function isFirstWsp(line: Uint8Array): boolean {
  return isWsp(line[0]);
}

function pad2(n: number): string {
  return n.toString().padStart(2, '0');
}

/**
 * Formats a local-time RFC 5322 `Date:` line, CRLF included.
 */
export function makeNowDateLine(now: Date = new Date()): string {
  const offsetMinutes = -now.getTimezoneOffset();
  const sign = offsetMinutes >= 0 ? '+' : '-';
  const absOffset = Math.abs(offsetMinutes);
  const zone = `${sign}${pad2(Math.floor(absOffset / 60))}${pad2(absOffset % 60)}`;

  const date = `${DAYS[now.getDay()]}, ${pad2(now.getDate())} ${MONTHS[now.getMonth()]} ${now.getFullYear()}`;
  const time = `${pad2(now.getHours())}:${pad2(now.getMinutes())}:${pad2(now.getSeconds())}`;
  return `Date: ${date} ${time} ${zone}${CRLF}`;
}

/**
 * Creates a `Message-ID:` line with 62 random alphanumeric characters, CRLF included.
 */
export function makeRandomMessageIdLine(): string {
  let id = '';
  for (let i = 0; i < MESSAGE_ID_LENGTH; i++) {
    id += MESSAGE_ID_CHARS.charAt(randomInt(MESSAGE_ID_CHARS.length));
  }
  return `Message-ID: <${id}>${CRLF}`;
}

export function isNotUpdate(options: UpdateOptions): boolean {
  return !options.updateDate && !options.updateMessageId;
}

/**
 * Replaces the first line matching `matchLine` and drops its folded continuation lines.
 */
function replaceLine(
  lines: Buffer[],
  update: boolean,
  matchLine: (line: Buffer) => boolean,
  makeLine: () => string
): void {
  if (!update) {
    return;
  }
  const idx = lines.findIndex(matchLine);
  if (idx === -1) {
    return;
  }

  let foldedCount = 0;
  while (idx + 1 + foldedCount < lines.length) {
    const next = lines[idx + 1 + foldedCount];
    if (next === undefined || !isFirstWsp(next)) {
      break;
    }
    foldedCount++;
  }

  // The last header line has no CRLF of its own; it belongs to the blank line.
  const last = lines[idx + foldedCount];
  const terminated = last !== undefined && last[last.length - 1] === LF;
  const line = makeLine();
  lines.splice(idx, 1 + foldedCount, Buffer.from(terminated ? line : line.slice(0, -CRLF.length)));
}

/**
 * Regenerates the `Date:` and/or `Message-ID:` lines of a header block.
 * Returns the input buffer itself when neither field is to be updated.
 */
export function replaceHeader(header: Buffer, options: UpdateOptions): Buffer {
  if (isNotUpdate(options)) {
    return header;
  }

  const lines = getRawLines(header);
  replaceLine(lines, options.updateDate, isDateLine, () => makeNowDateLine());
  replaceLine(lines, options.updateMessageId, isMessageIdLine, makeRandomMessageIdLine);
  return Buffer.concat(lines);
}

// ---------------------------------------------------------------------------
// Header/body split
// ---------------------------------------------------------------------------

/**
 * Returns the offset of the first CRLF CRLF sequence, or -1.
 */
export function findEmptyLine(buf: Uint8Array): number {
  let offset = 0;
  for (;;) {
    const idx = findCrIndex(buf, offset);
    if (idx === -1 || idx + 3 >= buf.length) {
      return -1;
    }
    if (buf[idx + 1] === LF && buf[idx + 2] === CR && buf[idx + 3] === LF) {
      return idx;
    }
    offset = idx + 1;
  }
}

export function splitMessage(buf: Buffer): SplitMessage | undefined {
  const idx = findEmptyLine(buf);
  if (idx === -1) {
    return undefined;
  }
  return {
    header: buf.subarray(0, idx),
    body: buf.subarray(idx + EMPTY_LINE.length),
  };
}

export function combineMessage(header: Uint8Array, body: Uint8Array): Buffer {
  return Buffer.concat([header, EMPTY_LINE, body]);
}

// ---------------------------------------------------------------------------
// Transformation
// ---------------------------------------------------------------------------

/**
 * Prepares a raw message for transmission.
 *
 * With both update flags off the input buffer is returned as is. Otherwise the
 * result is a new buffer and the input is left unchanged.
 *
 * @throws {SenderError} `MalformedMessage` when the message has no blank line.
 */
export function replaceMessage(buf: Buffer, options: UpdateOptions, file?: string): Buffer {
  if (isNotUpdate(options)) {
    return buf;
  }

  const message = splitMessage(buf);
  if (!message) {
    throw SenderError.malformedMessage(file);
  }

  const header = replaceHeader(message.header, options);
  return combineMessage(header, message.body);
}
