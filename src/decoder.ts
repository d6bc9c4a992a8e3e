/**
 * EBC frame decoder utility.
 *
 * Parses a captured command or response frame and displays its contents in
 * human-readable format.
 */

import { calculateChecksum, parseResponse } from "./frame.js";
import {
  COMMAND_LENGTH,
  END_BYTE,
  INIT_BYTE,
  RESPONSE_LENGTH,
  commandName,
  modeName,
} from "./protocol.js";
import { decodeValue } from "./value.js";

export type FrameKind = "command" | "response" | "unknown";

function hex(value: number): string {
  return value.toString(16).padStart(2, "0");
}

// ---------- EbcFrame class ----------

export class EbcFrame {
  private readonly frame: Buffer;

  constructor(hexString: string) {
    this.frame = Buffer.from(hexString.replace(/\s+/g, ""), "hex");
  }

  get length(): number {
    return this.frame.length;
  }

  get kind(): FrameKind {
    if (this.frame.length === COMMAND_LENGTH) return "command";
    if (this.frame.length === RESPONSE_LENGTH) return "response";
    return "unknown";
  }

  get frameStart(): number {
    return this.frame[0];
  }

  get frameStartValid(): boolean {
    return this.frameStart === INIT_BYTE;
  }

  get frameEnd(): number {
    return this.frame[this.frame.length - 1];
  }

  get frameEndValid(): boolean {
    return this.frameEnd === END_BYTE;
  }

  get checksum(): number {
    return this.frame[this.frame.length - 2];
  }

  get calculatedChecksum(): number {
    return calculateChecksum(this.frame.subarray(1, this.frame.length - 2));
  }

  get checksumValid(): boolean {
    return this.checksum === this.calculatedChecksum;
  }

  /** Mode and command nibbles of a command frame. */
  get commandCode(): [number, number] {
    return [this.frame[1] >> 4, this.frame[1] & 0x0f];
  }

  /** The three 16-bit arguments of a command frame. */
  get arguments(): [number, number, number] {
    return [
      decodeValue(this.frame.subarray(2, 4)),
      decodeValue(this.frame.subarray(4, 6)),
      decodeValue(this.frame.subarray(6, 8)),
    ];
  }

  get bytes(): Buffer {
    return this.frame;
  }
}

/**
 * Decode a frame and return a human-readable string.
 *
 * @param hexBytes  Array of hex byte strings (e.g. ["fa", "05", ...])
 *                  or a single hex string
 */
export function describeFrame(hexBytes: string | string[]): string {
  const hexString = Array.isArray(hexBytes) ? hexBytes.join("") : hexBytes;
  const frame = new EbcFrame(hexString);

  const lines: string[] = [];
  lines.push(`Length: ${frame.length} (${frame.kind})`);
  if (frame.kind === "unknown") {
    return lines.join("\n");
  }

  lines.push(`Frame start: ${hex(frame.frameStart)} (valid: ${frame.frameStartValid})`);
  lines.push(`Frame end: ${hex(frame.frameEnd)} (valid: ${frame.frameEndValid})`);
  lines.push(`Checksum: ${hex(frame.checksum)} (valid: ${frame.checksumValid})`);

  if (frame.kind === "command") {
    const [mode, command] = frame.commandCode;
    lines.push(`Mode: ${mode} (${modeName(mode)})`);
    lines.push(`Command: ${command} (${commandName(command)})`);
    lines.push(`Arguments: ${frame.arguments.join(", ")}`);
    return lines.join("\n");
  }

  const measurement = parseResponse(frame.bytes);
  if (!measurement) {
    return lines.join("\n");
  }
  lines.push(`Regime: ${measurement.regime} (mode ${measurement.mode}, state ${measurement.state})`);
  lines.push(`Current: ${measurement.iMeasured.toFixed(3)} A`);
  lines.push(`Voltage: ${measurement.uMeasured.toFixed(3)} V`);
  lines.push(`Stored charge: ${measurement.storedCharge}`);
  lines.push(`Current setting: ${measurement.iSetting.toFixed(3)} A`);
  lines.push(`Cutoff voltage: ${measurement.uCutoff.toFixed(2)} V`);
  lines.push(`Max time: ${measurement.maxTime}`);
  lines.push(`Ident: ${measurement.ident}`);
  lines.push(`Unknown: ${measurement.unknown}`);

  return lines.join("\n");
}
