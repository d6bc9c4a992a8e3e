import { describe, it, expect, beforeEach, vi } from "vitest";
import { EbcDevice } from "../src/device.js";
import type { Measurement } from "../src/frame.js";
import { OperationController, TERMINAL_READS_REQUIRED } from "../src/operations.js";
import { FakeTransport, ZERO_TIMING, mockLogger, responseFrame } from "./helpers.js";

// Regime = state * 10 + mode; mode 7 is CCCV charge, mode 0 CC discharge.
const WORKING = responseFrame({ regime: 17, voltage: 4000 });
const COMPLETED = responseFrame({ regime: 27, voltage: 4200 });
const IDLE = responseFrame({ regime: 7, voltage: 4200 });
const TIMEOUT = Buffer.alloc(0);

describe("OperationController", () => {
  let transport: FakeTransport;
  let device: EbcDevice;
  let controller: OperationController;
  let samples: Measurement[];
  const sink = (m: Measurement) => {
    samples.push(m);
  };

  beforeEach(async () => {
    transport = new FakeTransport();
    device = new EbcDevice("/dev/ttyUSB0", { transport, timing: ZERO_TIMING });
    await device.connect();
    transport.clearWritten();
    controller = new OperationController(device);
    samples = [];
  });

  describe("runUntilComplete", () => {
    it("returns after four terminal reads, not reset by working reads", async () => {
      transport.push(WORKING, COMPLETED, WORKING, COMPLETED, COMPLETED, TIMEOUT, COMPLETED, WORKING);

      await controller.runUntilComplete(sink);

      expect(samples.map((m) => m.state)).toEqual([
        "WORKING",
        "COMPLETED",
        "WORKING",
        "COMPLETED",
        "COMPLETED",
        "COMPLETED",
      ]);
      expect(transport.queued).toBe(1);
      expect(transport.written).toHaveLength(0);
    });

    it("counts IDLE as terminal", async () => {
      transport.push(IDLE, IDLE, COMPLETED, IDLE);
      await controller.runUntilComplete(sink);
      expect(samples).toHaveLength(TERMINAL_READS_REQUIRED);
    });

    it("discards stale input before polling", async () => {
      transport.push(COMPLETED, COMPLETED, COMPLETED, COMPLETED);
      await controller.runUntilComplete();
      expect(transport.resets).toBe(1);
    });

    it("stops polling once aborted", async () => {
      const abort = new AbortController();
      abort.abort();
      const aborted = new OperationController(device, { signal: abort.signal });
      transport.responder = () => WORKING;

      await expect(aborted.runUntilComplete(sink)).rejects.toMatchObject({ name: "AbortError" });
      expect(samples).toHaveLength(0);
    });
  });

  describe("operations", () => {
    beforeEach(() => {
      transport.responder = () => COMPLETED;
    });

    it("charges in CCCV mode and polls to completion", async () => {
      await controller.chargeCccv(4.2, 5, {}, sink);

      expect(transport.writtenHex()).toEqual(["fa7114c801b4000018f8"]);
      expect(samples).toHaveLength(4);
      // one reset after the start command settles, one when polling begins
      expect(transport.resets).toBe(2);
    });

    it("discharges at constant current", async () => {
      await controller.dischargeCc(2.5, 3.0, {}, sink);
      expect(transport.writtenHex()).toEqual(["fa010a64013c0000" + "52f8"]);
    });

    it("discharges at constant power", async () => {
      await controller.dischargeCp(10, 3.0, { timeout: 120 }, sink);
      expect(transport.commandCodes).toEqual([0x11]);
      expect(transport.written[0].subarray(6, 8)).toEqual(Buffer.from([0x00, 0x02]));
    });

    it("charges with a predefined profile", async () => {
      await controller.chargePredefined(0x5, 1, 4, {}, sink);
      expect(transport.commandCodes).toEqual([0x51]);
    });

    it("logs the operation start through the injected logger", async () => {
      const log = mockLogger();
      const logged = new OperationController(device, { logger: log });
      await logged.dischargeCc(1, 3);
      expect(log.info).toHaveBeenCalledWith("Starting discharge CC: 1A, cutoff 3V");
    });
  });

  describe("monitor", () => {
    it("forwards samples until aborted", async () => {
      const abort = new AbortController();
      const monitoring = new OperationController(device, { signal: abort.signal });
      transport.push(WORKING, TIMEOUT, WORKING);
      transport.responder = () => COMPLETED;

      const forward = vi.fn((m: Measurement) => {
        samples.push(m);
        if (samples.length === 3) abort.abort();
      });

      await expect(monitoring.monitor(forward)).rejects.toMatchObject({ name: "AbortError" });
      expect(forward).toHaveBeenCalledTimes(3);
      expect(samples.map((m) => m.state)).toEqual(["WORKING", "WORKING", "COMPLETED"]);
    });
  });
});
