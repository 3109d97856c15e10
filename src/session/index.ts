/**
 * One SMTP session: several EML files sent over a single connection.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { SenderError, errnoCode, isSenderError } from '../errors';
import type { Settings } from '../config';
import { replaceMessage } from '../message';
import type { SmtpCommand } from '../protocol';
import {
  SessionState,
  SessionStateMachine,
  data,
  displayCommand,
  ehlo,
  endOfData,
  formatCommand,
  mailFrom,
  quit,
  rcptTo,
  receiveReply,
  rset,
} from '../protocol';
import type { SmtpTransport, TransportFactory } from '../transport';
import { createTransport } from '../transport';
import type { Logger } from '../observability';
import { Timer, createNoopLogger } from '../observability';

/**
 * A file that was not sent.
 */
export interface SkippedFile {
  file: string;
  error: SenderError;
}

/**
 * Outcome of one session.
 */
export interface SessionResult {
  /** Files sent, in order. */
  sent: string[];
  /** Files skipped because they were missing or malformed. */
  skipped: SkippedFile[];
  /** Message bytes written, terminators excluded. */
  bytesSent: number;
  durationMs: number;
}

/**
 * Options for {@link sendMessages}.
 */
export interface SendMessagesOptions {
  /** Logger, already bound to the session's context where one applies. */
  logger?: Logger;
  /** Transport factory; TCP by default. */
  transportFactory?: TransportFactory;
}

/**
 * Drives the SMTP command sequence over an already connected transport.
 */
export class SmtpSession {
  private readonly transport: SmtpTransport;
  private readonly settings: Settings;
  private readonly logger: Logger;
  private readonly state = new SessionStateMachine();

  constructor(transport: SmtpTransport, settings: Settings, logger?: Logger) {
    this.transport = transport;
    this.settings = settings;
    this.logger = logger ?? createNoopLogger();
    this.state.transition(SessionState.Connected);
  }

  /** Gets the current protocol state. */
  getState(): SessionState {
    return this.state.getState();
  }

  /**
   * Sends every file in order, then QUIT.
   *
   * @throws {SenderError} on a negative reply or a lost connection.
   */
  async run(emlFiles: readonly string[]): Promise<SessionResult> {
    const timer = Timer.start();
    const result: SessionResult = { sent: [], skipped: [], bytesSent: 0, durationMs: 0 };

    try {
      await receiveReply(this.transport, this.logger);
      this.state.transition(SessionState.Greeted);

      await this.sendCommand(ehlo());
      this.state.transition(SessionState.Ready);

      for (const file of emlFiles) {
        let payload: Buffer;
        try {
          payload = await this.loadMessage(file);
        } catch (err) {
          if (isSenderError(err) && !err.isSessionFatal()) {
            this.logger.warn(err.message);
            result.skipped.push({ file, error: err });
            continue;
          }
          throw err;
        }

        if (result.sent.length > 0) {
          this.logger.info('---');
          await this.sendCommand(rset());
          this.state.transition(SessionState.Reset);
        }

        await this.sendMessage(file, payload);
        result.sent.push(file);
        result.bytesSent += payload.length;
      }

      await this.sendCommand(quit());
      this.state.transition(SessionState.Quit);
    } catch (err) {
      this.state.transition(SessionState.Closed);
      throw err;
    }

    result.durationMs = timer.elapsed();
    return result;
  }

  /**
   * Closes the transport and ends the session in the closed state.
   */
  async close(): Promise<void> {
    await this.transport.close();
    if (this.state.getState() !== SessionState.Closed) {
      this.state.transition(SessionState.Closed);
    }
  }

  private async loadMessage(file: string): Promise<Buffer> {
    let raw: Buffer;
    try {
      raw = await fs.readFile(path.resolve(file));
    } catch (err) {
      if (errnoCode(err) === 'ENOENT' || errnoCode(err) === 'EISDIR') {
        throw SenderError.fileMissing(file);
      }
      throw err;
    }
    return replaceMessage(
      raw,
      { updateDate: this.settings.updateDate, updateMessageId: this.settings.updateMessageId },
      file
    );
  }

  private async sendMessage(file: string, payload: Buffer): Promise<void> {
    await this.sendCommand(mailFrom(this.settings.fromAddress));
    this.state.transition(SessionState.MailFrom);

    for (const address of this.settings.toAddresses) {
      await this.sendCommand(rcptTo(address));
      this.state.transition(SessionState.RcptTo);
    }

    await this.sendCommand(data());
    this.state.transition(SessionState.Data);

    this.logger.info(`send: ${file}`);
    await this.transport.write(payload);
    this.state.transition(SessionState.Body);

    await this.sendCommand(endOfData());
    this.state.transition(SessionState.Terminator);
  }

  /**
   * Writes one command line and waits for its reply.
   */
  private async sendCommand(command: SmtpCommand): Promise<string> {
    this.logger.info(`send: ${displayCommand(command)}`);
    await this.transport.write(formatCommand(command));
    return receiveReply(this.transport, this.logger);
  }
}

/**
 * Opens one connection, sends the given files over it and closes it.
 */
export async function sendMessages(
  settings: Settings,
  emlFiles: readonly string[],
  options: SendMessagesOptions = {}
): Promise<SessionResult> {
  const factory = options.transportFactory ?? createTransport;
  const transport = factory({
    host: settings.smtpHost,
    port: settings.smtpPort,
    connectTimeout: settings.connectTimeout,
    readTimeout: settings.readTimeout,
  });

  await transport.connect();
  const session = new SmtpSession(transport, settings, options.logger);
  try {
    return await session.run(emlFiles);
  } finally {
    await session.close();
  }
}
