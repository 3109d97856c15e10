/**
 * Mock implementations for testing.
 */

import { SenderError } from '../errors';
import type { SmtpTransport, TransportOptions } from '../transport';

const DATA_TERMINATOR = '\r\n.\r\n';

/**
 * Mock transport configuration.
 */
export interface MockTransportConfig {
  /** Greeting reply lines. */
  greeting?: string[];
  /** EHLO reply lines. */
  ehloReply?: string[];
  /** Replies overriding the defaults, keyed by command verb (e.g. `RCPT TO`). */
  replies?: Record<string, string[]>;
  /** Verb after which the server hangs up without replying. */
  hangUpAfter?: string;
  /** Error to throw on connect. */
  connectError?: Error;
}

/**
 * Scripted in-process SMTP server behind the {@link SmtpTransport} interface.
 *
 * Command lines are answered from the defaults or from `replies`. After a
 * positive DATA reply all bytes are collected as message content until the
 * `CRLF . CRLF` terminator arrives.
 */
export class MockTransport implements SmtpTransport {
  private readonly config: MockTransportConfig;
  private readonly pendingLines: string[] = [];
  private readonly recordedCommands: string[] = [];
  private readonly receivedMessages: Buffer[] = [];
  private dataBuffer: Buffer | null = null;
  private connected = false;
  private hungUp = false;
  private closeCount = 0;

  constructor(config: MockTransportConfig = {}) {
    this.config = config;
  }

  async connect(): Promise<void> {
    if (this.config.connectError) {
      throw this.config.connectError;
    }
    this.connected = true;
    this.pendingLines.push(...(this.config.greeting ?? ['220 mock.smtp.server ESMTP ready']));
  }

  async readLine(): Promise<string | undefined> {
    return this.pendingLines.shift();
  }

  async write(data: Buffer | string): Promise<void> {
    if (!this.connected) {
      throw SenderError.connectionClosed('Not connected');
    }

    const bytes = typeof data === 'string' ? Buffer.from(data) : data;
    if (this.dataBuffer) {
      this.receiveData(bytes);
      return;
    }

    const text = bytes.toString('utf-8');
    for (const line of text.split('\r\n')) {
      if (line !== '') {
        this.handleCommand(line);
      }
    }
  }

  async close(): Promise<void> {
    this.connected = false;
    this.closeCount++;
  }

  isConnected(): boolean {
    return this.connected;
  }

  // Mock-specific methods

  /** Gets the command lines received, in order. */
  getCommands(): string[] {
    return [...this.recordedCommands];
  }

  /** Gets the message contents received, terminators removed. */
  getMessages(): Buffer[] {
    return [...this.receivedMessages];
  }

  /** Number of times close() was called. */
  getCloseCount(): number {
    return this.closeCount;
  }

  private receiveData(bytes: Buffer): void {
    const buffer = Buffer.concat([this.dataBuffer ?? Buffer.alloc(0), bytes]);
    const terminatorIndex = buffer.length - DATA_TERMINATOR.length;
    if (terminatorIndex >= 0 && buffer.subarray(terminatorIndex).toString('latin1') === DATA_TERMINATOR) {
      this.dataBuffer = null;
      this.receivedMessages.push(buffer.subarray(0, terminatorIndex));
      this.recordedCommands.push('.');
      this.reply('.', ['250 2.0.0 OK queued as MOCK123']);
    } else {
      this.dataBuffer = buffer;
    }
  }

  private handleCommand(line: string): void {
    this.recordedCommands.push(line);
    const verb = commandVerb(line);
    const override = this.config.replies?.[verb];

    if (override) {
      this.reply(verb, override);
    } else {
      this.reply(verb, this.defaultReply(verb));
    }

    const last = override ? override[override.length - 1] : '354';
    if (verb === 'DATA' && !this.hungUp && last !== undefined && last.startsWith('3')) {
      this.dataBuffer = Buffer.alloc(0);
    }
  }

  private defaultReply(verb: string): string[] {
    switch (verb) {
      case 'EHLO':
        return this.config.ehloReply ?? ['250-mock.smtp.server', '250-PIPELINING', '250 8BITMIME'];
      case 'MAIL FROM':
      case 'RCPT TO':
      case 'RSET':
        return ['250 2.0.0 OK'];
      case 'DATA':
        return ['354 End data with <CR><LF>.<CR><LF>'];
      case 'QUIT':
        return ['221 2.0.0 Bye'];
      default:
        return ['500 5.5.2 Command not recognized'];
    }
  }

  private reply(verb: string, lines: string[]): void {
    if (this.hungUp) {
      return;
    }
    if (this.config.hangUpAfter === verb) {
      this.hungUp = true;
      return;
    }
    this.pendingLines.push(...lines);
  }
}

/**
 * Extracts the verb of a command line: `MAIL FROM`, `RCPT TO` or the first word.
 */
function commandVerb(line: string): string {
  const upper = line.toUpperCase();
  for (const verb of ['MAIL FROM', 'RCPT TO']) {
    if (upper.startsWith(verb)) {
      return verb;
    }
  }
  return upper.split(' ')[0] ?? upper;
}

/**
 * Transport factory handing out a new mock per connection and remembering them.
 */
export class MockTransportFactory {
  readonly transports: MockTransport[] = [];
  readonly requestedOptions: TransportOptions[] = [];
  private readonly configFor: (index: number) => MockTransportConfig;

  constructor(config: MockTransportConfig | ((index: number) => MockTransportConfig) = {}) {
    this.configFor = typeof config === 'function' ? config : () => config;
  }

  readonly create = (options: TransportOptions): MockTransport => {
    const transport = new MockTransport(this.configFor(this.transports.length));
    this.transports.push(transport);
    this.requestedOptions.push(options);
    return transport;
  };
}
