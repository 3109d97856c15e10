/**
 * Raw EML sender
 *
 * Sends byte-exact `.eml` files to an SMTP server for interoperability
 * testing, optionally regenerating their `Date:` and `Message-ID:` lines.
 *
 * @example
 * ```typescript
 * import { createSettings, runSettings, createLogger } from 'raw-eml-sender';
 *
 * const settings = createSettings({
 *   smtpHost: 'localhost',
 *   smtpPort: 25,
 *   fromAddress: 'a001@example.com',
 *   toAddresses: ['a002@example.com'],
 *   emlFiles: ['test1.eml', 'test2.eml'],
 * });
 *
 * const batch = await runSettings(settings, { logger: createLogger() });
 * console.log(`${batch.succeeded}/${batch.total} sessions succeeded`);
 * ```
 *
 * @packageDocumentation
 */

// Re-export errors
export { SenderError, SenderErrorKind, isSenderError, toError, errnoCode } from './errors';

// Re-export config
export type { Settings, SettingsOptions } from './config';
export {
  DEFAULT_PORT,
  DEFAULT_CONNECT_TIMEOUT,
  DEFAULT_READ_TIMEOUT,
  settingsSchema,
  validateSettings,
  parseSettings,
  loadSettings,
  createSettings,
  makeJsonSample,
} from './config';

// Re-export message
export type { UpdateOptions, SplitMessage } from './message';
export {
  CR,
  LF,
  SPACE,
  HTAB,
  CRLF,
  EMPTY_LINE,
  findCrIndex,
  findLfIndex,
  findAllLfIndices,
  getRawLines,
  matchHeaderField,
  isDateLine,
  isMessageIdLine,
  isWsp,
  isFirstWsp,
  makeNowDateLine,
  makeRandomMessageIdLine,
  isNotUpdate,
  replaceHeader,
  findEmptyLine,
  splitMessage,
  combineMessage,
  replaceMessage,
} from './message';

// Re-export protocol
export type { SmtpCommand, SmtpReply, LineSource } from './protocol';
export {
  SmtpCommandType,
  SessionState,
  SessionStateMachine,
  ehlo,
  mailFrom,
  rcptTo,
  data,
  endOfData,
  rset,
  quit,
  formatCommand,
  displayCommand,
  isLastReply,
  isPositiveReply,
  parseReplyLine,
  receiveReply,
  canTransition,
} from './protocol';

// Re-export transport
export type { SmtpTransport, TransportOptions, TransportFactory } from './transport';
export { LineReader, TcpTransport, createTransport } from './transport';

// Re-export session
export type { SessionResult, SkippedFile, SendMessagesOptions } from './session';
export { SmtpSession, sendMessages } from './session';

// Re-export runner
export type { RunnerOptions, WorkerResult, BatchRunResult, SettingsFileResult } from './runner';
export { runSettings, processSettingsFile, processSettingsFiles } from './runner';

// Re-export observability
export type { LogEntry, SessionContext, Logger } from './observability';
export {
  LogLevel,
  ConsoleLogger,
  NoopLogger,
  InMemoryLogger,
  Timer,
  createSessionContext,
  formatEntry,
  parseLogLevel,
  createLogger,
  createNoopLogger,
} from './observability';

// Re-export mocks
export type { MockTransportConfig } from './mocks';
export { MockTransport, MockTransportFactory } from './mocks';
