/**
 * SMTP commands, reply classification and the session state table.
 */

import { SenderError, SenderErrorKind } from '../errors';
import type { Logger } from '../observability';

const CRLF = '\r\n';

/**
 * SMTP command types.
 */
export enum SmtpCommandType {
  Ehlo = 'EHLO',
  MailFrom = 'MAIL FROM',
  RcptTo = 'RCPT TO',
  Data = 'DATA',
  EndOfData = '.',
  Rset = 'RSET',
  Quit = 'QUIT',
}

/**
 * SMTP command with its full text, without the trailing CRLF.
 */
export interface SmtpCommand {
  /** Command type. */
  type: SmtpCommandType;
  /** Full command line. */
  text: string;
}

/**
 * Creates an EHLO command.
 */
export function ehlo(clientId = 'localhost'): SmtpCommand {
  return { type: SmtpCommandType.Ehlo, text: `EHLO ${clientId}` };
}

/**
 * Creates a MAIL FROM command.
 */
export function mailFrom(address: string): SmtpCommand {
  return { type: SmtpCommandType.MailFrom, text: `MAIL FROM: <${address}>` };
}

/**
 * Creates a RCPT TO command.
 */
export function rcptTo(address: string): SmtpCommand {
  return { type: SmtpCommandType.RcptTo, text: `RCPT TO: <${address}>` };
}

export function data(): SmtpCommand {
  return { type: SmtpCommandType.Data, text: 'DATA' };
}

/**
 * Creates the end-of-data terminator. Sent as `CRLF . CRLF` once formatted.
 */
export function endOfData(): SmtpCommand {
  return { type: SmtpCommandType.EndOfData, text: `${CRLF}.` };
}

export function rset(): SmtpCommand {
  return { type: SmtpCommandType.Rset, text: 'RSET' };
}

export function quit(): SmtpCommand {
  return { type: SmtpCommandType.Quit, text: 'QUIT' };
}

/**
 * Formats a command for transmission.
 */
export function formatCommand(command: SmtpCommand): string {
  return `${command.text}${CRLF}`;
}

/**
 * Renders a command for logs, with the terminator's control characters spelled out.
 */
export function displayCommand(command: SmtpCommand): string {
  return command.type === SmtpCommandType.EndOfData ? '<CRLF>.' : command.text;
}

/**
 * One line of an SMTP reply.
 */
export interface SmtpReply {
  /** Three-digit status code. */
  code: number;
  /** False when a `-` after the code announces more lines. */
  isLast: boolean;
  /** Text after the code and separator. */
  text: string;
  /** The whole line. */
  line: string;
}

const REPLY_LINE_REGEX = /^(\d{3})([ -]|$)(.*)$/;

/**
 * True when the line ends a (possibly multi-line) reply.
 */
export function isLastReply(line: string): boolean {
  return parseReplyLine(line)?.isLast === true;
}

/**
 * True for 2xx and 3xx replies.
 */
export function isPositiveReply(line: string): boolean {
  switch (line.charAt(0)) {
    case '2':
    case '3':
      return true;
    default:
      return false;
  }
}

/**
 * Parses one reply line. Returns undefined for lines that are not reply lines.
 */
export function parseReplyLine(line: string): SmtpReply | undefined {
  const match = REPLY_LINE_REGEX.exec(line);
  if (!match) {
    return undefined;
  }
  return {
    code: parseInt(match[1] ?? '', 10),
    isLast: match[2] !== '-',
    text: match[3] ?? '',
    line,
  };
}

/**
 * Source of text lines from the server, without line terminators.
 * Resolves undefined once the peer has closed the connection.
 */
export interface LineSource {
  readLine(): Promise<string | undefined>;
}

/**
 * Reads one reply and returns its last line.
 *
 * Every line read is logged. Continuation lines are otherwise ignored.
 *
 * @throws {SenderError} `ConnectionClosed` if the input ends before the last line,
 * `NegativeReply` if the reply is not 2xx or 3xx.
 */
export async function receiveReply(source: LineSource, logger: Logger): Promise<string> {
  for (;;) {
    const raw = await source.readLine();
    if (raw === undefined) {
      throw SenderError.connectionClosed();
    }

    const line = raw.trimEnd();
    logger.info(`recv: ${line}`);

    const reply = parseReplyLine(line);
    if (reply?.isLast) {
      if (isPositiveReply(reply.line)) {
        return reply.line;
      }
      throw SenderError.negativeReply(reply.line);
    }
  }
}

/**
 * SMTP session states.
 */
export enum SessionState {
  /** Not connected. */
  Disconnected = 'disconnected',
  /** Connected, waiting for greeting. */
  Connected = 'connected',
  /** Greeting received. */
  Greeted = 'greeted',
  /** EHLO accepted. */
  Ready = 'ready',
  /** MAIL FROM accepted. */
  MailFrom = 'mail_from',
  /** At least one RCPT TO accepted. */
  RcptTo = 'rcpt_to',
  /** DATA accepted, ready for content. */
  Data = 'data',
  /** Message content written. */
  Body = 'body',
  /** Terminator accepted, message queued. */
  Terminator = 'terminator',
  /** RSET accepted. */
  Reset = 'reset',
  /** QUIT accepted. */
  Quit = 'quit',
  /** Connection closed. */
  Closed = 'closed',
}

const VALID_TRANSITIONS: Record<SessionState, SessionState[]> = {
  [SessionState.Disconnected]: [SessionState.Connected],
  [SessionState.Connected]: [SessionState.Greeted, SessionState.Closed],
  [SessionState.Greeted]: [SessionState.Ready, SessionState.Closed],
  [SessionState.Ready]: [SessionState.MailFrom, SessionState.Quit, SessionState.Closed],
  [SessionState.MailFrom]: [SessionState.RcptTo, SessionState.Closed],
  [SessionState.RcptTo]: [
    SessionState.RcptTo, // Additional recipients
    SessionState.Data,
    SessionState.Closed,
  ],
  [SessionState.Data]: [SessionState.Body, SessionState.Closed],
  [SessionState.Body]: [SessionState.Terminator, SessionState.Closed],
  [SessionState.Terminator]: [SessionState.Reset, SessionState.Quit, SessionState.Closed],
  [SessionState.Reset]: [SessionState.MailFrom, SessionState.Quit, SessionState.Closed],
  [SessionState.Quit]: [SessionState.Closed],
  [SessionState.Closed]: [],
};

/**
 * Validates state transitions.
 */
export function canTransition(from: SessionState, to: SessionState): boolean {
  return VALID_TRANSITIONS[from].includes(to);
}

/**
 * Tracks the state of one SMTP session.
 */
export class SessionStateMachine {
  private state: SessionState = SessionState.Disconnected;

  /** Gets the current state. */
  getState(): SessionState {
    return this.state;
  }

  /**
   * Transitions to a new state.
   */
  transition(to: SessionState): void {
    if (!canTransition(this.state, to)) {
      throw new SenderError(
        SenderErrorKind.CommandSequence,
        `Invalid state transition from ${this.state} to ${to}`
      );
    }
    this.state = to;
  }
}
