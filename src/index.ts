/**
 * ebc-load – A TypeScript library for driving ZKE EBC-Axx electronic loads
 * and battery testers over their serial protocol.
 */

// Device session
export { EbcDevice } from "./device.js";
export type { EbcDeviceOptions, CommandLimits, SessionState } from "./device.js";

// Controllers
export {
  OperationController,
  PollingController,
  TERMINAL_READS_REQUIRED,
} from "./operations.js";
export type { ControllerOptions } from "./operations.js";
export {
  RampController,
  RAMP_SEED_CURRENT,
  RAMP_DECAY_FACTOR,
  RAMP_CURRENT_FLOOR,
} from "./ramp.js";

// Protocol codec
export { encodeValue, decodeValue, MAX_VALUE } from "./value.js";
export { buildCommand, parseResponse, calculateChecksum } from "./frame.js";
export type { Measurement, MeasurementSink } from "./frame.js";
export {
  Mode,
  Command,
  State,
  INIT_BYTE,
  END_BYTE,
  COMMAND_LENGTH,
  RESPONSE_LENGTH,
  PREDEFINED_CHARGE_MODES,
  isPredefinedChargeMode,
  isTerminalState,
  modeName,
  commandName,
  stateName,
} from "./protocol.js";
export type { ModeValue, CommandValue, StateName, PredefinedChargeMode } from "./protocol.js";

// Transport
export { SerialTransport } from "./transport.js";
export type { Transport, TransportOpenOptions } from "./transport.js";

// Errors
export {
  EbcError,
  ConnectionError,
  NotConnectedError,
  CommunicationError,
  CommandError,
  DeviceBusyError,
  InvalidNibbleError,
  OutOfRangeError,
  InvalidLengthError,
} from "./errors.js";

// Utilities
export { nullLogger, createConsoleLogger, createLogger } from "./logger.js";
export type { Logger, CliLoggerOptions } from "./logger.js";
export { DEFAULT_TIMING, sleep } from "./timing.js";
export type { Timing } from "./timing.js";
export { CsvWriter, CSV_HEADER } from "./csv.js";
export type { CsvWriterOptions } from "./csv.js";
export { EbcFrame, describeFrame } from "./decoder.js";
export type { FrameKind } from "./decoder.js";
