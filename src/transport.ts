/**
 * Byte channel between the session and the instrument.
 *
 * `SerialTransport` adapts the event-driven `serialport` stream to the
 * read-n-bytes-with-timeout model the protocol is polled with: incoming data
 * is buffered, and `read(n)` resolves as soon as `n` bytes are available or
 * the timeout expires, with whatever has arrived by then.
 */

import { SerialPort } from "serialport";

export interface TransportOpenOptions {
  path: string;
  baudRate: number;
  dataBits: 8;
  parity: "even";
  stopBits: 1;
  rtscts: false;
  /** Read timeout in seconds */
  timeout: number;
}

export interface Transport {
  open(options: TransportOpenOptions): Promise<void>;
  write(data: Buffer): Promise<void>;
  /** Read up to `length` bytes; fewer (possibly none) on timeout. */
  read(length: number): Promise<Buffer>;
  resetInputBuffer(): Promise<void>;
  close(): Promise<void>;
  isOpen(): boolean;
}

interface PendingRead {
  length: number;
  resolve: (data: Buffer) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
}

export class SerialTransport implements Transport {
  private port: SerialPort | null = null;
  private rxBuffer: Buffer = Buffer.alloc(0);
  private pending: PendingRead | null = null;
  private timeoutMs = 1000;
  /** Last error the port emitted; fails further reads and writes until closed. */
  private failure: Error | null = null;

  async open(options: TransportOpenOptions): Promise<void> {
    if (this.port) {
      throw new Error(`Serial port ${this.port.path} is already open`);
    }

    this.timeoutMs = options.timeout * 1000;
    this.rxBuffer = Buffer.alloc(0);
    this.failure = null;

    const port = new SerialPort({
      path: options.path,
      baudRate: options.baudRate,
      dataBits: options.dataBits,
      parity: options.parity,
      stopBits: options.stopBits,
      rtscts: options.rtscts,
      autoOpen: false,
    });

    await new Promise<void>((resolve, reject) => {
      port.open((err) => {
        if (err) {
          port.removeAllListeners();
          reject(new Error(`Failed to open ${options.path}: ${err.message}`));
          return;
        }
        resolve();
      });
    });

    port.on("data", (chunk: Buffer) => this.onData(chunk));
    port.on("error", (err: Error) => this.onError(err));
    port.on("close", () => {
      if (this.port === port) {
        this.port = null;
        this.settlePending();
      }
    });
    this.port = port;
  }

  async write(data: Buffer): Promise<void> {
    const port = this.requireHealthyPort();
    await new Promise<void>((resolve, reject) => {
      port.write(data, (err) => {
        if (err) {
          reject(err);
          return;
        }
        port.drain((drainErr) => (drainErr ? reject(drainErr) : resolve()));
      });
    });
  }

  async read(length: number): Promise<Buffer> {
    this.requireHealthyPort();
    if (this.pending) {
      throw new Error("A read is already in progress");
    }
    if (this.rxBuffer.length >= length) {
      return this.take(length);
    }

    return new Promise<Buffer>((resolve, reject) => {
      const timer = setTimeout(() => this.settlePending(), this.timeoutMs);
      this.pending = { length, resolve, reject, timer };
    });
  }

  async resetInputBuffer(): Promise<void> {
    const port = this.requirePort();
    this.rxBuffer = Buffer.alloc(0);
    await new Promise<void>((resolve, reject) => {
      port.flush((err) => (err ? reject(err) : resolve()));
    });
  }

  async close(): Promise<void> {
    const port = this.port;
    if (!port) return;

    this.port = null;
    this.failure = null;
    this.settlePending();
    this.rxBuffer = Buffer.alloc(0);
    port.removeAllListeners();

    if (!port.isOpen) return;
    await new Promise<void>((resolve, reject) => {
      port.close((err) => (err ? reject(err) : resolve()));
    });
  }

  isOpen(): boolean {
    return this.port !== null && this.port.isOpen;
  }

  private requirePort(): SerialPort {
    if (!this.port) {
      throw new Error("Serial port is not open");
    }
    return this.port;
  }

  private requireHealthyPort(): SerialPort {
    const port = this.requirePort();
    if (this.failure) {
      throw new Error(`Serial port error: ${this.failure.message}`);
    }
    return port;
  }

  private onError(err: Error): void {
    this.failure = err;
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    clearTimeout(pending.timer);
    pending.reject(err);
  }

  private onData(chunk: Buffer): void {
    this.rxBuffer = Buffer.concat([this.rxBuffer, chunk]);
    if (this.pending && this.rxBuffer.length >= this.pending.length) {
      this.settlePending();
    }
  }

  /** Resolve the pending read with what is buffered, up to its length. */
  private settlePending(): void {
    const pending = this.pending;
    if (!pending) return;
    this.pending = null;
    clearTimeout(pending.timer);
    pending.resolve(this.take(pending.length));
  }

  private take(length: number): Buffer {
    const out = this.rxBuffer.subarray(0, length);
    this.rxBuffer = this.rxBuffer.subarray(out.length);
    return Buffer.from(out);
  }
}
