/**
 * Adaptive charge/discharge to a target voltage.
 *
 * The device ends a CC discharge (or CCCV charge) when the terminal voltage
 * crosses the target, but under load that voltage sags (or rises) away from
 * the resting value. The ramp restarts at a lower current every time the
 * device stops, so the battery settles ever closer to the target, until the
 * current drops below {@link RAMP_CURRENT_FLOOR}.
 */

import type { MeasurementSink } from "./frame.js";
import { PollingController } from "./operations.js";
import { isTerminalState } from "./protocol.js";

/** Initial current, A. */
export const RAMP_SEED_CURRENT = 5.0;
/** Current multiplier applied after each stop. */
export const RAMP_DECAY_FACTOR = 0.8;
/** The ramp ends once the current falls below this, A. */
export const RAMP_CURRENT_FLOOR = 0.05;

type Direction = "charge" | "discharge";

export class RampController extends PollingController {
  /**
   * Discharge until the battery rests at `targetVoltage`.
   *
   * @returns false when the voltage was already below the target and no
   *          command was sent, true when the ramp ran to completion
   */
  async rampDischargeToVoltage(targetVoltage: number, sink?: MeasurementSink): Promise<boolean> {
    return this.ramp("discharge", targetVoltage, sink);
  }

  /**
   * Charge until the battery rests at `targetVoltage`.
   *
   * @returns false when the voltage was already above the target and no
   *          command was sent, true when the ramp ran to completion
   */
  async rampChargeToVoltage(targetVoltage: number, sink?: MeasurementSink): Promise<boolean> {
    return this.ramp("charge", targetVoltage, sink);
  }

  private async ramp(
    direction: Direction,
    targetVoltage: number,
    sink: MeasurementSink | undefined
  ): Promise<boolean> {
    if (await this.alreadyAtTarget(direction, targetVoltage)) {
      return false;
    }

    let current = RAMP_SEED_CURRENT;
    this.log.info(
      `Starting ${direction} to ${targetVoltage.toFixed(3)}V with initial current ${current.toFixed(3)}A`
    );
    await this.issue(direction, "start", current, targetVoltage);
    await this.settle();

    for (;;) {
      const sample = await this.poll();
      if (!sample) continue;

      sink?.(sample);
      if (!isTerminalState(sample.state)) continue;

      current *= RAMP_DECAY_FACTOR;
      if (current < RAMP_CURRENT_FLOOR) {
        this.log.info(`Ramp to ${targetVoltage.toFixed(3)}V finished`);
        return true;
      }
      this.log.info(`Adjusting ${direction} current to ${current.toFixed(3)}A`);
      await this.issue(direction, "adjust", current, targetVoltage);
      await this.settle();
    }
  }

  /** Read until a sample arrives and compare it with the target. */
  private async alreadyAtTarget(direction: Direction, targetVoltage: number): Promise<boolean> {
    await this.device.discardUnread();

    let sample = await this.device.readMeasurement();
    while (!sample) {
      this.signal?.throwIfAborted();
      sample = await this.device.readMeasurement();
    }

    const voltage = sample.uMeasured;
    if (direction === "discharge" && voltage < targetVoltage) {
      this.log.warn(
        `Voltage ${voltage.toFixed(3)}V is already below target ${targetVoltage.toFixed(3)}V`
      );
      return true;
    }
    if (direction === "charge" && voltage > targetVoltage) {
      this.log.warn(
        `Voltage ${voltage.toFixed(3)}V is already above target ${targetVoltage.toFixed(3)}V`
      );
      return true;
    }
    return false;
  }

  private async issue(
    direction: Direction,
    step: "start" | "adjust",
    current: number,
    targetVoltage: number
  ): Promise<void> {
    if (direction === "discharge") {
      if (step === "start") {
        await this.device.startDischargeCc(current, targetVoltage);
      } else {
        await this.device.adjustDischargeCc(current, targetVoltage);
      }
    } else if (step === "start") {
      await this.device.startChargeCccv(targetVoltage, current);
    } else {
      await this.device.adjustChargeCccv(targetVoltage, current);
    }
  }
}
