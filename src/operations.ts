/**
 * Single-command operations: issue a start command, then poll measurements
 * until the device reports a terminal state often enough.
 *
 * There is no timeout here beyond the device-side limit sent with the
 * command: a device that never reaches IDLE/COMPLETED is polled until the
 * caller aborts.
 */

import type { CommandLimits, EbcDevice } from "./device.js";
import type { Measurement, MeasurementSink } from "./frame.js";
import { resolveLogger, type Logger } from "./logger.js";
import { isTerminalState } from "./protocol.js";
import { resolveTiming, sleep, type Timing } from "./timing.js";

/** Terminal reads needed before an operation counts as finished. */
export const TERMINAL_READS_REQUIRED = 4;

export interface ControllerOptions {
  /** Aborts polling between reads */
  signal?: AbortSignal;
  /** Delay overrides, in milliseconds. Default: the device's timing */
  timing?: Partial<Timing>;
  /** Enable verbose/debug logging. Default: false */
  verbose?: boolean;
  /** Custom logger instance */
  logger?: Logger;
}

/**
 * Shared polling plumbing for the operation and ramp controllers.
 */
export abstract class PollingController {
  protected readonly device: EbcDevice;
  protected readonly timing: Timing;
  protected readonly log: Logger;
  protected readonly signal: AbortSignal | undefined;

  constructor(device: EbcDevice, options: ControllerOptions = {}) {
    this.device = device;
    this.timing = resolveTiming({ ...device.timing, ...options.timing });
    this.log = resolveLogger(options);
    this.signal = options.signal;
  }

  /** Wait one poll interval and read; null when no frame arrived. */
  protected async poll(): Promise<Measurement | null> {
    await sleep(this.timing.pollInterval, this.signal);
    this.signal?.throwIfAborted();
    return this.device.readMeasurement();
  }

  /** Wait for a freshly issued command to take effect, then drop stale input. */
  protected async settle(): Promise<void> {
    await sleep(this.timing.operationSettle, this.signal);
    await this.device.discardUnread();
  }
}

export class OperationController extends PollingController {
  /**
   * Poll until {@link TERMINAL_READS_REQUIRED} terminal states have been
   * seen, forwarding every sample to `sink`.
   *
   * Non-terminal reads in between do not reset the count.
   */
  async runUntilComplete(sink?: MeasurementSink): Promise<void> {
    await this.device.discardUnread();

    let terminalReads = 0;
    while (terminalReads < TERMINAL_READS_REQUIRED) {
      const sample = await this.poll();
      if (!sample) continue;

      this.log.debug(`Got data: ${sample.raw}`);
      sink?.(sample);
      if (isTerminalState(sample.state)) {
        terminalReads++;
      }
    }
  }

  /** Forward measurements to `sink` until aborted. */
  async monitor(sink: MeasurementSink): Promise<never> {
    for (;;) {
      const sample = await this.poll();
      if (sample) sink(sample);
    }
  }

  /**
   * Charge in CCCV mode until the device reports completion.
   *
   * @param voltage  Charge voltage in V
   * @param current  Charge current in A
   */
  async chargeCccv(
    voltage: number,
    current: number,
    limits: CommandLimits = {},
    sink?: MeasurementSink
  ): Promise<void> {
    this.log.info(`Starting charge CC-CV: ${current}A, ${voltage}V`);
    await this.device.startChargeCccv(voltage, current, limits);
    await this.settle();
    await this.runUntilComplete(sink);
  }

  /**
   * Charge with a chemistry's built-in profile until completion.
   *
   * @param mode     One of the predefined charge modes
   * @param current  Charge current in A
   * @param cells    Number of cells in series
   */
  async chargePredefined(
    mode: number,
    current: number,
    cells: number,
    limits: CommandLimits = {},
    sink?: MeasurementSink
  ): Promise<void> {
    this.log.info(`Starting charge: mode ${mode}, ${current}A, ${cells} cell(s)`);
    await this.device.startChargePredefined(mode, current, cells, limits);
    await this.settle();
    await this.runUntilComplete(sink);
  }

  /**
   * Discharge at constant current down to `cutoffVoltage`.
   */
  async dischargeCc(
    current: number,
    cutoffVoltage: number,
    limits: CommandLimits = {},
    sink?: MeasurementSink
  ): Promise<void> {
    this.log.info(`Starting discharge CC: ${current}A, cutoff ${cutoffVoltage}V`);
    await this.device.startDischargeCc(current, cutoffVoltage, limits);
    await this.settle();
    await this.runUntilComplete(sink);
  }

  /**
   * Discharge at constant power down to `cutoffVoltage`.
   */
  async dischargeCp(
    power: number,
    cutoffVoltage: number,
    limits: CommandLimits = {},
    sink?: MeasurementSink
  ): Promise<void> {
    this.log.info(`Starting discharge CP: ${power}W, cutoff ${cutoffVoltage}V`);
    await this.device.startDischargeCp(power, cutoffVoltage, limits);
    await this.settle();
    await this.runUntilComplete(sink);
  }
}
