/**
 * Command and response frame construction and parsing.
 *
 * Command frame (10 bytes):
 *   FA | (mode << 4 | command) | D0..D5 | XOR checksum | F8
 *
 * Response frame (19 bytes):
 *   FA | regime | I(2) | U(2) | charge(2) | unknown(2) | I set(2) |
 *   U cutoff(2) | max time(2) | ident | XOR checksum | F8
 */

import { InvalidNibbleError } from "./errors.js";
import { nullLogger, type Logger } from "./logger.js";
import {
  COMMAND_DATA_LENGTH,
  COMMAND_LENGTH,
  END_BYTE,
  INIT_BYTE,
  RESPONSE_LENGTH,
  modeName,
  stateName,
  type StateName,
} from "./protocol.js";
import { decodeValue } from "./value.js";

// ---------- Measurement ----------

/** One decoded response frame. */
export interface Measurement {
  /** Regime byte as two hex digits */
  readonly regime: string;
  readonly mode: string;
  readonly state: StateName;
  /** Measured current in A */
  readonly iMeasured: number;
  /** Measured voltage in V */
  readonly uMeasured: number;
  /** Stored charge, raw device units */
  readonly storedCharge: number;
  /** Commanded current in A */
  readonly iSetting: number;
  /** Cutoff voltage in V */
  readonly uCutoff: number;
  /** Max time, raw device units */
  readonly maxTime: number;
  /** Identification byte as two hex digits */
  readonly ident: string;
  /** Bytes 8-9, meaning unknown (observed as 0000) */
  readonly unknown: string;
  /** Whole frame as hex */
  readonly raw: string;
}

export type MeasurementSink = (sample: Measurement) => void;

// ---------- Checksum ----------

/** XOR of all given bytes. */
export function calculateChecksum(data: Uint8Array): number {
  let checksum = 0;
  for (let i = 0; i < data.length; i++) {
    checksum ^= data[i];
  }
  return checksum;
}

function hexByte(value: number): string {
  return value.toString(16).padStart(2, "0");
}

// ---------- Commands ----------

function checkNibble(field: "mode" | "command", value: number): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xf) {
    throw new InvalidNibbleError(field, value);
  }
}

/**
 * Build a command frame. `data` is zero-padded or truncated to 6 bytes; the
 * checksum and end byte are always computed here.
 */
export function buildCommand(
  mode: number,
  command: number,
  data: Uint8Array = Buffer.alloc(0)
): Buffer {
  checkNibble("mode", mode);
  checkNibble("command", command);

  const frame = Buffer.alloc(COMMAND_LENGTH);
  frame[0] = INIT_BYTE;
  frame[1] = (mode << 4) | command;
  frame.set(data.subarray(0, COMMAND_DATA_LENGTH), 2);
  frame[COMMAND_LENGTH - 2] = calculateChecksum(frame.subarray(1, COMMAND_LENGTH - 2));
  frame[COMMAND_LENGTH - 1] = END_BYTE;
  return frame;
}

// ---------- Responses ----------

/**
 * Parse a response frame.
 *
 * Returns null for an empty read, a wrong length or wrong start/end bytes.
 * A checksum mismatch is only logged: the device occasionally sends frames
 * that fail it and the payload is still usable.
 */
export function parseResponse(data: Buffer, log: Logger = nullLogger): Measurement | null {
  if (data.length === 0) {
    return null;
  }
  if (data.length !== RESPONSE_LENGTH) {
    log.error(
      `Invalid response length: expected ${RESPONSE_LENGTH}, got ${data.length}`
    );
    return null;
  }
  if (data[0] !== INIT_BYTE || data[data.length - 1] !== END_BYTE) {
    log.error(
      `Invalid response format: expected ${hexByte(INIT_BYTE)}...${hexByte(END_BYTE)}, got ${data.toString("hex")}`
    );
    return null;
  }

  const checksum = data[RESPONSE_LENGTH - 2];
  const calculated = calculateChecksum(data.subarray(1, RESPONSE_LENGTH - 2));
  if (checksum !== calculated) {
    log.warn(
      `Checksum mismatch: expected ${hexByte(calculated)}, got ${hexByte(checksum)}`
    );
  }

  const regime = data[1];

  return {
    regime: hexByte(regime),
    mode: modeName(regime % 10),
    state: stateName(Math.floor(regime / 10)),
    iMeasured: decodeValue(data.subarray(2, 4)) / 1000,
    uMeasured: decodeValue(data.subarray(4, 6)) / 1000,
    storedCharge: decodeValue(data.subarray(6, 8)),
    iSetting: decodeValue(data.subarray(10, 12)) / 1000,
    uCutoff: decodeValue(data.subarray(12, 14)) / 100,
    maxTime: decodeValue(data.subarray(14, 16)),
    ident: hexByte(data[16]),
    unknown: data.subarray(8, 10).toString("hex"),
    raw: data.toString("hex"),
  };
}
