/**
 * Error taxonomy for the EBC-Axx protocol and device session.
 */

export class EbcError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EbcError";
  }
}

/** Transport could not be opened or the connect handshake failed. */
export class ConnectionError extends EbcError {
  constructor(message: string) {
    super(message);
    this.name = "ConnectionError";
  }
}

/** A command or read was attempted on a session that is not open. */
export class NotConnectedError extends EbcError {
  constructor(message = "Device is not connected") {
    super(message);
    this.name = "NotConnectedError";
  }
}

/** Writing to (or reading from) an open transport failed. */
export class CommunicationError extends EbcError {
  constructor(message: string) {
    super(message);
    this.name = "CommunicationError";
  }
}

/** Invalid domain input to a typed command builder. */
export class CommandError extends EbcError {
  constructor(message: string) {
    super(message);
    this.name = "CommandError";
  }
}

export class DeviceBusyError extends EbcError {
  constructor(message = "Device is busy with another operation") {
    super(message);
    this.name = "DeviceBusyError";
  }
}

export class InvalidNibbleError extends EbcError {
  public readonly field: "mode" | "command";
  public readonly value: number;

  constructor(field: "mode" | "command", value: number) {
    super(`Invalid ${field} code: ${value} (expected 0-15)`);
    this.name = "InvalidNibbleError";
    this.field = field;
    this.value = value;
  }
}

export class OutOfRangeError extends EbcError {
  public readonly value: number;

  constructor(value: number, min: number, max: number) {
    super(`Value must be an integer between ${min} and ${max}, got ${value}`);
    this.name = "OutOfRangeError";
    this.value = value;
  }
}

export class InvalidLengthError extends EbcError {
  constructor(expected: number, actual: number) {
    super(`Data must be exactly ${expected} bytes, got ${actual} bytes`);
    this.name = "InvalidLengthError";
  }
}
