/**
 * EbcDevice – session with a ZKE EBC-Axx electronic load / battery tester.
 *
 * Owns the transport, performs the connect/disconnect handshake and exposes
 * typed commands. Commands are fire-and-forget: the device never answers a
 * command directly, it reports a measurement frame about once a second which
 * is polled with {@link EbcDevice.readMeasurement}.
 */

import {
  CommandError,
  CommunicationError,
  ConnectionError,
  DeviceBusyError,
  NotConnectedError,
} from "./errors.js";
import { buildCommand, parseResponse, type Measurement } from "./frame.js";
import { resolveLogger, type Logger } from "./logger.js";
import {
  Command,
  I_MULT,
  Mode,
  P_MULT,
  RESPONSE_LENGTH,
  V_MULT,
  isPredefinedChargeMode,
  modeName,
} from "./protocol.js";
import { resolveTiming, sleep, type Timing } from "./timing.js";
import { SerialTransport, type Transport } from "./transport.js";
import { encodeValue } from "./value.js";

// ---------- Options ----------

export interface EbcDeviceOptions {
  /** Serial baud rate. Default: 9600 */
  baudRate?: number;
  /** Read timeout in seconds. Default: 1 */
  timeout?: number;
  /** Byte channel to use. Default: a new SerialTransport */
  transport?: Transport;
  /** Delay overrides, in milliseconds */
  timing?: Partial<Timing>;
  /** Enable verbose/debug logging. Default: false */
  verbose?: boolean;
  /** Custom logger instance */
  logger?: Logger;
}

/** Operation limit sent to the device. Zero means no limit. */
export interface CommandLimits {
  /** Timeout in seconds, sent in whole minutes. Default: 0 */
  timeout?: number;
}

export type SessionState = "not-connected" | "connected" | "disconnected";

function toUnits(name: string, value: number, multiplier: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new CommandError(`${name} must be a non-negative number, got ${value}`);
  }
  return Math.round(value * multiplier);
}

function toMinutes(timeout = 0): number {
  if (!Number.isFinite(timeout) || timeout < 0) {
    throw new CommandError(`Timeout must be a non-negative number of seconds, got ${timeout}`);
  }
  return Math.floor(timeout / 60);
}

// ---------- Main class ----------

export class EbcDevice {
  public readonly path: string;
  public readonly baudRate: number;
  public readonly timeout: number;
  public readonly timing: Timing;

  private readonly transport: Transport;
  private readonly log: Logger;
  private state: SessionState = "not-connected";
  private busy = false;

  constructor(path: string, options: EbcDeviceOptions = {}) {
    this.path = path;
    this.baudRate = options.baudRate ?? 9600;
    this.timeout = options.timeout ?? 1.0;
    this.timing = resolveTiming(options.timing);
    this.transport = options.transport ?? new SerialTransport();
    this.log = resolveLogger(options);
  }

  /** A connected session whose port has since closed reports "disconnected". */
  get sessionState(): SessionState {
    if (this.state === "connected" && !this.transport.isOpen()) {
      return "disconnected";
    }
    return this.state;
  }

  get isConnected(): boolean {
    return this.transport.isOpen();
  }

  get isBusy(): boolean {
    return this.busy;
  }

  // ---------- Connection management ----------

  /** Open the port and perform the connect handshake. */
  async connect(): Promise<void> {
    if (this.transport.isOpen()) {
      this.log.debug(`Already connected to ${this.path}`);
      return;
    }

    this.log.info(`Connecting to ${this.path} at ${this.baudRate} baud`);
    try {
      await this.transport.open({
        path: this.path,
        baudRate: this.baudRate,
        dataBits: 8,
        parity: "even",
        stopBits: 1,
        rtscts: false,
        timeout: this.timeout,
      });
      await sleep(this.timing.connectSettle);
      await this.sendCommand(Mode.SYS, Command.CONNECT);
      await sleep(this.timing.connectSettle);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.log.error(`Connection failed: ${message}`);
      if (this.transport.isOpen()) {
        try {
          await this.transport.close();
        } catch (closeErr) {
          this.log.error(`Failed to close port after connection failure: ${String(closeErr)}`);
        }
      }
      throw new ConnectionError(`Failed to connect to device on ${this.path}: ${message}`);
    }

    this.state = "connected";
    this.log.info(`Connected to device on ${this.path}`);
  }

  /** Send the disconnect command and close the port. No-op when closed. */
  async disconnect(): Promise<void> {
    if (!this.transport.isOpen()) {
      return;
    }
    this.log.debug("Disconnecting from device");
    try {
      await this.sendCommand(Mode.SYS, Command.DISCONNECT);
    } finally {
      await this.transport.close();
      this.state = "disconnected";
      this.log.info("Device disconnected");
    }
  }

  /**
   * Run `fn` as the session's single operation.
   *
   * A stop command is sent first as a safety reset. Whatever way `fn` ends,
   * a stop is sent and the session disconnected afterwards. Failures during
   * that cleanup are logged and only rethrown when `fn` itself succeeded.
   */
  async withOperation<T>(fn: () => Promise<T>): Promise<T> {
    if (this.busy) {
      throw new DeviceBusyError();
    }
    this.busy = true;

    let failed = false;
    try {
      await this.sendStop();
      await sleep(this.timing.operationPause);
      return await fn();
    } catch (err) {
      failed = true;
      throw err;
    } finally {
      this.busy = false;
      await this.release(failed);
    }
  }

  private async release(bodyFailed: boolean): Promise<void> {
    let cleanupError: unknown = null;

    if (this.transport.isOpen()) {
      try {
        await this.sendStop();
      } catch (err) {
        this.log.error(`Failed to send stop during cleanup: ${String(err)}`);
        cleanupError = err;
      }
    }
    try {
      await this.disconnect();
    } catch (err) {
      this.log.error(`Failed to disconnect during cleanup: ${String(err)}`);
      cleanupError ??= err;
    }

    if (!bodyFailed && cleanupError !== null) {
      throw cleanupError;
    }
  }

  // ---------- Frame send/receive ----------

  /**
   * Send a command frame and give the firmware time to process it.
   *
   * @param mode     Mode nibble (0-15)
   * @param command  Command nibble (0-15)
   * @param data     Up to 6 payload bytes, zero-padded
   */
  async sendCommand(mode: number, command: number, data?: Uint8Array): Promise<void> {
    if (!this.transport.isOpen()) {
      this.log.error("Cannot send command - device is not connected");
      throw new NotConnectedError();
    }

    const frame = buildCommand(mode, command, data);
    this.log.debug(`SENT: ${frame.toString("hex")}`);

    try {
      await this.transport.write(frame);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.log.error(`Failed to send command: ${message}`);
      throw new CommunicationError(`Communication error: ${message}`);
    }
    this.log.debug(`Command 0x${frame[1].toString(16).padStart(2, "0")} sent`);

    await sleep(this.timing.commandSettle);
  }

  /** Send a command whose payload is three encoded 16-bit values. */
  async sendCommand16(
    mode: number,
    command: number,
    arg1 = 0,
    arg2 = 0,
    arg3 = 0
  ): Promise<void> {
    const payload = Buffer.concat([encodeValue(arg1), encodeValue(arg2), encodeValue(arg3)]);
    await this.sendCommand(mode, command, payload);
  }

  /** Stop any running operation. */
  async sendStop(): Promise<void> {
    this.log.debug("Sending stop command");
    await this.sendCommand(Mode.SYS, Command.STOP);
  }

  /**
   * Read one measurement frame. Returns null when nothing (or nothing
   * usable) arrived within the read timeout.
   */
  async readMeasurement(): Promise<Measurement | null> {
    if (!this.transport.isOpen()) {
      throw new NotConnectedError();
    }

    let data: Buffer;
    try {
      data = await this.transport.read(RESPONSE_LENGTH);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new CommunicationError(`Communication error: ${message}`);
    }
    this.log.debug(`RECD: ${data.toString("hex")}`);
    return parseResponse(data, this.log);
  }

  /** Drop unread input so the next read starts from a fresh frame. */
  async discardUnread(): Promise<void> {
    if (!this.transport.isOpen()) return;
    this.log.debug("Discarding unread data");
    await this.transport.resetInputBuffer();
  }

  // ---------- Charge commands ----------

  /**
   * Start a charge with a chemistry's built-in profile.
   *
   * @param mode     One of C_NIMH, C_NICD, C_LIPO, C_LIFE, C_PB
   * @param current  Charge current in A
   * @param cells    Number of cells in series
   */
  async startChargePredefined(
    mode: number,
    current: number,
    cells = 1,
    limits: CommandLimits = {}
  ): Promise<void> {
    await this.chargePredefined(Command.START, mode, current, cells, limits);
  }

  async adjustChargePredefined(
    mode: number,
    current: number,
    cells = 1,
    limits: CommandLimits = {}
  ): Promise<void> {
    await this.chargePredefined(Command.ADJUST, mode, current, cells, limits);
  }

  private async chargePredefined(
    command: number,
    mode: number,
    current: number,
    cells: number,
    limits: CommandLimits
  ): Promise<void> {
    if (!isPredefinedChargeMode(mode)) {
      throw new CommandError(`Invalid mode for charge operation: ${modeName(mode)}`);
    }
    if (!Number.isInteger(cells) || cells < 1) {
      throw new CommandError(`Cell count must be a positive integer, got ${cells}`);
    }
    await this.sendCommand16(
      mode,
      command,
      toUnits("Current", current, I_MULT),
      cells,
      toMinutes(limits.timeout)
    );
  }

  /**
   * Start a constant-current / constant-voltage charge.
   *
   * @param voltage  Charge voltage in V
   * @param current  Charge current in A
   */
  async startChargeCccv(voltage: number, current: number, limits: CommandLimits = {}): Promise<void> {
    await this.chargeCccv(Command.START, voltage, current, limits);
  }

  async adjustChargeCccv(voltage: number, current: number, limits: CommandLimits = {}): Promise<void> {
    await this.chargeCccv(Command.ADJUST, voltage, current, limits);
  }

  private async chargeCccv(
    command: number,
    voltage: number,
    current: number,
    limits: CommandLimits
  ): Promise<void> {
    await this.sendCommand16(
      Mode.C_CCCV,
      command,
      toUnits("Current", current, I_MULT),
      toUnits("Voltage", voltage, V_MULT),
      toMinutes(limits.timeout)
    );
  }

  // ---------- Discharge commands ----------

  /**
   * Start a constant-current discharge.
   *
   * @param current        Discharge current in A
   * @param cutoffVoltage  Voltage at which the discharge ends, in V
   */
  async startDischargeCc(
    current: number,
    cutoffVoltage: number,
    limits: CommandLimits = {}
  ): Promise<void> {
    await this.dischargeCc(Command.START, current, cutoffVoltage, limits);
  }

  async adjustDischargeCc(
    current: number,
    cutoffVoltage: number,
    limits: CommandLimits = {}
  ): Promise<void> {
    await this.dischargeCc(Command.ADJUST, current, cutoffVoltage, limits);
  }

  private async dischargeCc(
    command: number,
    current: number,
    cutoffVoltage: number,
    limits: CommandLimits
  ): Promise<void> {
    await this.sendCommand16(
      Mode.D_CC,
      command,
      toUnits("Current", current, I_MULT),
      toUnits("Cutoff voltage", cutoffVoltage, V_MULT),
      toMinutes(limits.timeout)
    );
  }

  /**
   * Start a constant-power discharge.
   *
   * @param power          Discharge power in W
   * @param cutoffVoltage  Voltage at which the discharge ends, in V
   */
  async startDischargeCp(
    power: number,
    cutoffVoltage: number,
    limits: CommandLimits = {}
  ): Promise<void> {
    await this.dischargeCp(Command.START, power, cutoffVoltage, limits);
  }

  async adjustDischargeCp(
    power: number,
    cutoffVoltage: number,
    limits: CommandLimits = {}
  ): Promise<void> {
    await this.dischargeCp(Command.ADJUST, power, cutoffVoltage, limits);
  }

  private async dischargeCp(
    command: number,
    power: number,
    cutoffVoltage: number,
    limits: CommandLimits
  ): Promise<void> {
    await this.sendCommand16(
      Mode.D_CP,
      command,
      toUnits("Power", power, P_MULT),
      toUnits("Cutoff voltage", cutoffVoltage, V_MULT),
      toMinutes(limits.timeout)
    );
  }
}
