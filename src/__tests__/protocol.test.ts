/**
 * Tests for SMTP commands, replies and session states
 */

import { describe, it, expect } from 'vitest';
import {
  SessionState,
  SessionStateMachine,
  canTransition,
  data,
  displayCommand,
  ehlo,
  endOfData,
  formatCommand,
  isLastReply,
  isPositiveReply,
  mailFrom,
  parseReplyLine,
  quit,
  rcptTo,
  receiveReply,
  rset,
  SmtpCommandType,
} from '../protocol';
import type { LineSource } from '../protocol';
import { SenderError, SenderErrorKind } from '../errors';
import { InMemoryLogger } from '../observability';

function sourceOf(lines: string[]): LineSource {
  const pending = [...lines];
  return {
    readLine: async () => pending.shift(),
  };
}

async function catchError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('Expected promise to reject');
}

describe('commands', () => {
  it('should format command lines', () => {
    expect(formatCommand(ehlo())).toBe('EHLO localhost\r\n');
    expect(formatCommand(mailFrom('a001@example.com'))).toBe('MAIL FROM: <a001@example.com>\r\n');
    expect(formatCommand(rcptTo('a002@example.com'))).toBe('RCPT TO: <a002@example.com>\r\n');
    expect(formatCommand(data())).toBe('DATA\r\n');
    expect(formatCommand(rset())).toBe('RSET\r\n');
    expect(formatCommand(quit())).toBe('QUIT\r\n');
  });

  it('should send the terminator as CRLF . CRLF', () => {
    expect(formatCommand(endOfData())).toBe('\r\n.\r\n');
  });

  it('should spell out the terminator in logs', () => {
    expect(displayCommand(endOfData())).toBe('<CRLF>.');
    expect(displayCommand(quit())).toBe('QUIT');
  });

  it('should tag commands with their type', () => {
    expect(endOfData().type).toBe(SmtpCommandType.EndOfData);
    expect(rcptTo('a002@example.com').type).toBe(SmtpCommandType.RcptTo);
    expect(displayCommand({ type: SmtpCommandType.Data, text: '\r\n.' })).toBe('\r\n.');
  });
});

describe('reply classification', () => {
  it('should recognize last lines', () => {
    expect(isLastReply('250 OK')).toBe(true);
    expect(isLastReply('250')).toBe(true);
    expect(isLastReply('250-PIPELINING')).toBe(false);
    expect(isLastReply('25 OK')).toBe(false);
    expect(isLastReply('')).toBe(false);
  });

  it('should treat 2xx and 3xx as positive', () => {
    expect(isPositiveReply('250 OK')).toBe(true);
    expect(isPositiveReply('354 go ahead')).toBe(true);
    expect(isPositiveReply('421 closing')).toBe(false);
    expect(isPositiveReply('550 no')).toBe(false);
  });

  it('should parse reply lines', () => {
    expect(parseReplyLine('250-PIPELINING')).toEqual({
      code: 250,
      isLast: false,
      text: 'PIPELINING',
      line: '250-PIPELINING',
    });
    expect(parseReplyLine('221')).toEqual({ code: 221, isLast: true, text: '', line: '221' });
    expect(parseReplyLine('hello')).toBeUndefined();
  });
});

describe('receiveReply', () => {
  it('should return the last line of a multi-line reply', async () => {
    const logger = new InMemoryLogger();
    const line = await receiveReply(sourceOf(['250-first', '250-second', '250 last']), logger);

    expect(line).toBe('250 last');
    expect(logger.getMessages()).toEqual(['recv: 250-first', 'recv: 250-second', 'recv: 250 last']);
  });

  it('should end on a line holding only the code', async () => {
    const line = await receiveReply(sourceOf(['250-first', '250']), new InMemoryLogger());
    expect(line).toBe('250');
  });

  it('should skip lines that are not reply lines', async () => {
    const logger = new InMemoryLogger();
    const line = await receiveReply(sourceOf(['hello there', '220 ready']), logger);

    expect(line).toBe('220 ready');
    expect(logger.getMessages()).toEqual(['recv: hello there', 'recv: 220 ready']);
  });

  it('should strip trailing whitespace', async () => {
    const line = await receiveReply(sourceOf(['220 ready  ']), new InMemoryLogger());
    expect(line).toBe('220 ready');
  });

  it('should leave following lines unread', async () => {
    const source = sourceOf(['250 OK', '354 next']);
    await receiveReply(source, new InMemoryLogger());
    expect(await source.readLine()).toBe('354 next');
  });

  it('should throw on a negative reply', async () => {
    const err = await catchError(receiveReply(sourceOf(['550 5.1.1 User unknown']), new InMemoryLogger()));

    expect(err).toBeInstanceOf(SenderError);
    if (err instanceof SenderError) {
      expect(err.kind).toBe(SenderErrorKind.NegativeReply);
      expect(err.replyCode).toBe(550);
      expect(err.message).toBe('550 5.1.1 User unknown');
    }
  });

  it('should throw when the connection ends mid-reply', async () => {
    const logger = new InMemoryLogger();
    const err = await catchError(receiveReply(sourceOf(['250-first']), logger));

    expect(err).toBeInstanceOf(SenderError);
    if (err instanceof SenderError) {
      expect(err.kind).toBe(SenderErrorKind.ConnectionClosed);
      expect(err.message).toBe('Connection closed by foreign host');
    }
    expect(logger.getMessages()).toEqual(['recv: 250-first']);
  });
});

describe('SessionStateMachine', () => {
  it('should start disconnected', () => {
    expect(new SessionStateMachine().getState()).toBe(SessionState.Disconnected);
  });

  it('should follow a two-message session', () => {
    const machine = new SessionStateMachine();
    const states = [
      SessionState.Connected,
      SessionState.Greeted,
      SessionState.Ready,
      SessionState.MailFrom,
      SessionState.RcptTo,
      SessionState.RcptTo,
      SessionState.Data,
      SessionState.Body,
      SessionState.Terminator,
      SessionState.Reset,
      SessionState.MailFrom,
      SessionState.RcptTo,
      SessionState.Data,
      SessionState.Body,
      SessionState.Terminator,
      SessionState.Quit,
      SessionState.Closed,
    ];
    for (const state of states) {
      machine.transition(state);
    }
    expect(machine.getState()).toBe(SessionState.Closed);
  });

  it('should reject out-of-order commands', () => {
    const machine = new SessionStateMachine();
    machine.transition(SessionState.Connected);

    expect(() => machine.transition(SessionState.Data)).toThrow(
      'Invalid state transition from connected to data'
    );
    expect(machine.getState()).toBe(SessionState.Connected);
  });

  it('should only reset after a finished message', () => {
    expect(canTransition(SessionState.Terminator, SessionState.Reset)).toBe(true);
    expect(canTransition(SessionState.Ready, SessionState.Reset)).toBe(false);
    expect(canTransition(SessionState.Data, SessionState.Reset)).toBe(false);
  });

  it('should allow nothing after closed', () => {
    for (const state of Object.values(SessionState)) {
      expect(canTransition(SessionState.Closed, state)).toBe(false);
    }
  });
});
