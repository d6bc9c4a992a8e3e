/**
 * 16-bit value encoding used in command payloads and response fields.
 *
 * Every group of 240 values is shifted up by 16, so neither byte of an
 * encoded value ever lands in 0xF0-0xFF, the range the protocol reserves
 * for framing bytes.
 */

import { InvalidLengthError, OutOfRangeError } from "./errors.js";

export const MAX_VALUE = 57599;

const GROUP_SIZE = 240;
const GROUP_OFFSET = 16;

/** Encode `value` (0-57599) as two big-endian bytes. */
export function encodeValue(value: number): Buffer {
  if (!Number.isInteger(value) || value < 0 || value > MAX_VALUE) {
    throw new OutOfRangeError(value, 0, MAX_VALUE);
  }

  const group = Math.floor(value / GROUP_SIZE);
  const encoded = group === 0 ? value : value + group * GROUP_OFFSET;

  const buf = Buffer.alloc(2);
  buf.writeUInt16BE(encoded, 0);
  return buf;
}

/** Decode two bytes produced by {@link encodeValue}. */
export function decodeValue(data: Uint8Array): number {
  if (data.length !== 2) {
    throw new InvalidLengthError(2, data.length);
  }
  const msb = data[0];
  const lsb = data[1];
  return ((msb << 8) | lsb) - msb * GROUP_OFFSET;
}
