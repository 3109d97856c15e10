/**
 * SMTP transport layer.
 */

import * as net from 'net';
import type { Readable } from 'stream';
import { SenderError, SenderErrorKind } from '../errors';
import type { LineSource } from '../protocol';

const LF = 0x0a;

/**
 * SMTP transport interface.
 */
export interface SmtpTransport extends LineSource {
  /** Connects to the SMTP server. */
  connect(): Promise<void>;
  /** Reads the next line from the server; undefined once the connection has ended. */
  readLine(): Promise<string | undefined>;
  /** Writes bytes as they are. */
  write(data: Buffer | string): Promise<void>;
  /** Closes the connection. */
  close(): Promise<void>;
  /** Checks if connected. */
  isConnected(): boolean;
}

/**
 * Options for a TCP transport.
 */
export interface TransportOptions {
  /** SMTP server hostname. */
  host: string;
  /** SMTP server port. */
  port: number;
  /** Connect timeout in milliseconds. */
  connectTimeout: number;
  /** Idle read timeout for the whole connection in milliseconds; 0 disables it. */
  readTimeout: number;
}

/**
 * Creates a transport for one session.
 */
export type TransportFactory = (options: TransportOptions) => SmtpTransport;

type Waiter = {
  resolve: (line: string | undefined) => void;
  reject: (err: Error) => void;
};

/**
 * Splits an incoming byte stream into lines.
 *
 * Lines are split on LF and returned without their CR LF. Bytes left over when
 * the stream ends are returned as a last line.
 */
export class LineReader implements LineSource {
  private buffer: Buffer = Buffer.alloc(0);
  private readonly lines: string[] = [];
  private readonly waiters: Waiter[] = [];
  private ended = false;
  private error: Error | null = null;

  constructor(stream: Readable) {
    stream.on('data', (chunk: Buffer | string) => {
      this.addData(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
    });
    stream.once('end', () => this.end());
    stream.once('close', () => this.end());
    stream.on('error', (err: Error) => {
      this.fail(SenderError.connectionClosed(err.message, err));
    });
  }

  readLine(): Promise<string | undefined> {
    const line = this.lines.shift();
    if (line !== undefined) {
      return Promise.resolve(line);
    }
    if (this.error) {
      return Promise.reject(this.error);
    }
    if (this.ended) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  /**
   * Fails every pending and future read with the given error.
   */
  fail(err: Error): void {
    if (this.error || this.ended) {
      return;
    }
    this.error = err;
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(err);
    }
  }

  private addData(chunk: Buffer): void {
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);

    let lineEnd = this.buffer.indexOf(LF);
    while (lineEnd !== -1) {
      this.pushLine(this.buffer.subarray(0, lineEnd));
      this.buffer = this.buffer.subarray(lineEnd + 1);
      lineEnd = this.buffer.indexOf(LF);
    }
  }

  private end(): void {
    if (this.ended) {
      return;
    }
    if (this.buffer.length > 0) {
      this.pushLine(this.buffer);
      this.buffer = Buffer.alloc(0);
    }
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve(undefined);
    }
  }

  private pushLine(bytes: Buffer): void {
    const line = bytes.toString('utf-8').replace(/\r$/, '');
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve(line);
    } else {
      this.lines.push(line);
    }
  }
}

/**
 * TCP transport implementation.
 */
export class TcpTransport implements SmtpTransport {
  private socket: net.Socket | null = null;
  private reader: LineReader | null = null;
  private readonly options: TransportOptions;

  constructor(options: TransportOptions) {
    this.options = options;
  }

  async connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = net.createConnection({
        host: this.options.host,
        port: this.options.port,
      });

      const timeout = setTimeout(() => {
        socket.destroy();
        reject(
          new SenderError(
            SenderErrorKind.ConnectTimeout,
            `Connection timeout after ${this.options.connectTimeout}ms`
          )
        );
      }, this.options.connectTimeout);

      const onError = (err: Error): void => {
        clearTimeout(timeout);
        reject(new SenderError(SenderErrorKind.ConnectionRefused, err.message, { cause: err }));
      };

      socket.once('error', onError);
      socket.once('connect', () => {
        clearTimeout(timeout);
        socket.removeListener('error', onError);
        this.attach(socket);
        resolve();
      });
    });
  }

  readLine(): Promise<string | undefined> {
    if (!this.reader) {
      return Promise.reject(SenderError.connectionClosed('Not connected'));
    }
    return this.reader.readLine();
  }

  async write(data: Buffer | string): Promise<void> {
    return new Promise((resolve, reject) => {
      const socket = this.socket;
      if (!socket || !this.isConnected()) {
        reject(SenderError.connectionClosed('Not connected'));
        return;
      }

      socket.write(data, (err) => {
        if (err) {
          reject(new SenderError(SenderErrorKind.WriteFailed, err.message, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  async close(): Promise<void> {
    return new Promise((resolve) => {
      const socket = this.socket;
      this.socket = null;
      this.reader = null;
      if (!socket || socket.destroyed) {
        resolve();
        return;
      }
      // The peer may hang up before our FIN is acknowledged.
      socket.once('close', () => resolve());
      socket.end(() => socket.destroy());
    });
  }

  isConnected(): boolean {
    return this.socket !== null && !this.socket.destroyed;
  }

  private attach(socket: net.Socket): void {
    const reader = new LineReader(socket);
    if (this.options.readTimeout > 0) {
      socket.setTimeout(this.options.readTimeout, () => {
        reader.fail(
          SenderError.connectionClosed(`Connection timed out after ${this.options.readTimeout}ms`)
        );
        socket.destroy();
      });
    }
    this.socket = socket;
    this.reader = reader;
  }
}

/**
 * Creates a TCP transport from options.
 */
export function createTransport(options: TransportOptions): SmtpTransport {
  return new TcpTransport(options);
}
