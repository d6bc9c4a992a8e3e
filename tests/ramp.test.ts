import { describe, it, expect, beforeEach } from "vitest";
import { EbcDevice } from "../src/device.js";
import type { Measurement } from "../src/frame.js";
import { RampController } from "../src/ramp.js";
import { decodeValue } from "../src/value.js";
import { FakeTransport, ZERO_TIMING, mockLogger, responseFrame } from "./helpers.js";

function currentArgument(frame: Buffer): number {
  return decodeValue(frame.subarray(2, 4));
}

function voltageArgument(frame: Buffer): number {
  return decodeValue(frame.subarray(4, 6));
}

describe("RampController", () => {
  let transport: FakeTransport;
  let device: EbcDevice;
  let samples: Measurement[];
  const sink = (m: Measurement) => {
    samples.push(m);
  };

  beforeEach(async () => {
    transport = new FakeTransport();
    device = new EbcDevice("/dev/ttyUSB0", { transport, timing: ZERO_TIMING });
    await device.connect();
    transport.clearWritten();
    samples = [];
  });

  describe("already at target", () => {
    it("does not discharge a battery already below the target", async () => {
      const log = mockLogger();
      const ramp = new RampController(device, { logger: log });
      transport.push(responseFrame({ regime: 0, voltage: 2500 }));

      await expect(ramp.rampDischargeToVoltage(3.0, sink)).resolves.toBe(false);

      expect(transport.written).toHaveLength(0);
      expect(samples).toHaveLength(0);
      expect(log.warn).toHaveBeenCalledWith("Voltage 2.500V is already below target 3.000V");
    });

    it("does not charge a battery already above the target", async () => {
      const ramp = new RampController(device);
      transport.push(responseFrame({ regime: 7, voltage: 4300 }));

      await expect(ramp.rampChargeToVoltage(4.2, sink)).resolves.toBe(false);
      expect(transport.written).toHaveLength(0);
    });

    it("waits through empty reads for the first sample", async () => {
      const ramp = new RampController(device);
      transport.push(Buffer.alloc(0), Buffer.alloc(0), responseFrame({ regime: 0, voltage: 2900 }));

      await expect(ramp.rampDischargeToVoltage(3.0, sink)).resolves.toBe(false);
      expect(transport.queued).toBe(0);
    });
  });

  describe("charge ramp", () => {
    it("decays the current 21 times from 5 A before stopping", async () => {
      const ramp = new RampController(device);
      transport.push(responseFrame({ regime: 7, voltage: 3700 }));
      transport.responder = () => responseFrame({ regime: 27, voltage: 4200 });

      await expect(ramp.rampChargeToVoltage(4.2, sink)).resolves.toBe(true);

      const codes = transport.commandCodes;
      expect(codes[0]).toBe(0x71);
      expect(codes.slice(1)).toEqual(Array(20).fill(0x77));

      const currents = transport.written.map(currentArgument);
      expect(currents.slice(0, 6)).toEqual([5000, 4000, 3200, 2560, 2048, 1638]);
      expect(currents.slice(-2)).toEqual([72, 58]);
      expect(transport.written.map(voltageArgument)).toEqual(Array(21).fill(420));

      expect(samples).toHaveLength(21);
    });
  });

  describe("discharge ramp", () => {
    it("only steps the current on terminal reads", async () => {
      const ramp = new RampController(device);
      transport.push(
        responseFrame({ regime: 10, voltage: 4000 }),
        responseFrame({ regime: 10, voltage: 3400 }),
        Buffer.alloc(0),
        responseFrame({ regime: 10, voltage: 3200 })
      );
      transport.responder = () => responseFrame({ regime: 20, voltage: 3000 });

      await expect(ramp.rampDischargeToVoltage(3.0, sink)).resolves.toBe(true);

      expect(transport.commandCodes[0]).toBe(0x01);
      expect(transport.commandCodes.slice(1)).toEqual(Array(20).fill(0x07));
      expect(transport.written.map(voltageArgument)).toEqual(Array(21).fill(300));
      expect(samples.filter((m) => m.state === "WORKING")).toHaveLength(2);
      expect(samples.filter((m) => m.state === "COMPLETED")).toHaveLength(21);
    });

    it("stops when aborted mid-ramp", async () => {
      const abort = new AbortController();
      const ramp = new RampController(device, { signal: abort.signal });
      transport.push(responseFrame({ regime: 10, voltage: 4000 }));
      transport.responder = () => responseFrame({ regime: 10, voltage: 3500 });

      const stopAfterTwo = (m: Measurement) => {
        samples.push(m);
        if (samples.length === 2) abort.abort();
      };

      await expect(ramp.rampDischargeToVoltage(3.0, stopAfterTwo)).rejects.toMatchObject({
        name: "AbortError",
      });
      expect(transport.commandCodes).toEqual([0x01]);
    });
  });
});
