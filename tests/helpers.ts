import { vi } from "vitest";
import { calculateChecksum } from "../src/frame.js";
import type { Logger } from "../src/logger.js";
import type { Timing } from "../src/timing.js";
import type { Transport, TransportOpenOptions } from "../src/transport.js";
import { encodeValue } from "../src/value.js";

export const ZERO_TIMING: Timing = {
  connectSettle: 0,
  commandSettle: 0,
  operationPause: 0,
  operationSettle: 0,
  pollInterval: 0,
};

/** Raw field values of a response frame, in device units. */
export interface ResponseFields {
  regime: number;
  current?: number;
  voltage?: number;
  charge?: number;
  currentSetting?: number;
  cutoff?: number;
  maxTime?: number;
  ident?: number;
}

export function responseFrame(fields: ResponseFields): Buffer {
  const frame = Buffer.alloc(19);
  frame[0] = 0xfa;
  frame[1] = fields.regime;
  encodeValue(fields.current ?? 0).copy(frame, 2);
  encodeValue(fields.voltage ?? 0).copy(frame, 4);
  encodeValue(fields.charge ?? 0).copy(frame, 6);
  encodeValue(fields.currentSetting ?? 0).copy(frame, 10);
  encodeValue(fields.cutoff ?? 0).copy(frame, 12);
  encodeValue(fields.maxTime ?? 0).copy(frame, 14);
  frame[16] = fields.ident ?? 0x05;
  frame[17] = calculateChecksum(frame.subarray(1, 17));
  frame[18] = 0xf8;
  return frame;
}

export function mockLogger() {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies Logger;
}

/**
 * In-memory stand-in for the serial link. Reads return queued frames first,
 * then whatever `responder` produces, then an empty buffer (a timeout).
 */
export class FakeTransport implements Transport {
  readonly written: Buffer[] = [];
  openOptions: TransportOpenOptions | null = null;
  resets = 0;
  closes = 0;
  failOpen: Error | null = null;
  failWrite: Error | null = null;
  failClose: Error | null = null;
  responder: (() => Buffer) | null = null;

  private readonly queue: Buffer[] = [];
  private opened = false;

  async open(options: TransportOpenOptions): Promise<void> {
    if (this.failOpen) throw this.failOpen;
    this.openOptions = options;
    this.opened = true;
  }

  async write(data: Buffer): Promise<void> {
    if (this.failWrite) throw this.failWrite;
    this.written.push(Buffer.from(data));
  }

  async read(length: number): Promise<Buffer> {
    const next = this.queue.shift() ?? this.responder?.() ?? Buffer.alloc(0);
    return next.subarray(0, length);
  }

  async resetInputBuffer(): Promise<void> {
    this.resets++;
  }

  async close(): Promise<void> {
    this.closes++;
    if (this.failClose) throw this.failClose;
    this.opened = false;
  }

  isOpen(): boolean {
    return this.opened;
  }

  push(...frames: Buffer[]): void {
    this.queue.push(...frames);
  }

  get queued(): number {
    return this.queue.length;
  }

  /** Command bytes (mode << 4 | command) of every frame written. */
  get commandCodes(): number[] {
    return this.written.map((frame) => frame[1]);
  }

  writtenHex(): string[] {
    return this.written.map((frame) => frame.toString("hex"));
  }

  clearWritten(): void {
    this.written.length = 0;
  }
}
