#!/usr/bin/env node

/**
 * ebc-load CLI – command-line interface for ZKE EBC-Axx electronic loads
 * and battery testers. Measurements are written as CSV to stdout or a file.
 */

import { Command } from "commander";
import { CsvWriter } from "./csv.js";
import { describeFrame } from "./decoder.js";
import { EbcDevice } from "./device.js";
import type { MeasurementSink } from "./frame.js";
import { createLogger, type Logger } from "./logger.js";
import { OperationController } from "./operations.js";
import { Mode, type PredefinedChargeMode } from "./protocol.js";
import { openOutput, type OutputTarget } from "./output.js";
import { RampController } from "./ramp.js";

interface DeviceCommandOptions {
  port: string;
  baud: number;
  timeout: number;
  output?: string;
  force: boolean;
  append: boolean;
  debug: boolean;
  debugFile?: string;
}

interface ActionContext {
  device: EbcDevice;
  operation: OperationController;
  ramp: RampController;
  sink: MeasurementSink;
  log: Logger;
}

const CHEMISTRIES: Record<string, PredefinedChargeMode> = {
  nimh: Mode.C_NIMH,
  nicd: Mode.C_NICD,
  lipo: Mode.C_LIPO,
  life: Mode.C_LIFE,
  pb: Mode.C_PB,
};

const toFloat = (v: string) => parseFloat(v);
const toInt = (v: string) => parseInt(v, 10);

function withDeviceOptions(command: Command): Command {
  return command
    .option("--port <path>", "Serial port device", "/dev/ttyUSB0")
    .option("--baud <number>", "Serial baud rate", toInt, 9600)
    .option("-t, --timeout <seconds>", "Read timeout in seconds", toFloat, 1.0)
    .option("-o, --output <file>", "Output CSV file (stdout when absent)")
    .option("-f, --force", "Overwrite the output file if it exists", false)
    .option("-a, --append", "Append to the output file instead of overwriting", false)
    .option("-d, --debug", "Enable debug logging", false)
    .option("--debug-file <file>", "Write debug logs to this file instead of stderr");
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isAbortError(err: unknown): boolean {
  return err instanceof Error && err.name === "AbortError";
}

/**
 * Connect, run `body` inside the device's operation scope and clean up.
 * SIGINT aborts the running operation; stop/disconnect still happen.
 */
async function runDeviceAction(
  opts: DeviceCommandOptions,
  body: (ctx: ActionContext) => Promise<unknown>
): Promise<void> {
  const log = createLogger({ debug: opts.debug, debugFile: opts.debugFile });

  let output: OutputTarget;
  try {
    output = openOutput(opts);
  } catch (err) {
    console.error(`Error: ${errorMessage(err)}`);
    process.exit(1);
  }

  const writer = new CsvWriter(output.out, { header: output.header });
  const device = new EbcDevice(opts.port, {
    baudRate: opts.baud,
    timeout: opts.timeout,
    logger: log,
  });

  const abort = new AbortController();
  const onSigint = () => abort.abort();
  process.once("SIGINT", onSigint);

  let outputError: Error | null = null;
  output.file?.on("error", (err) => {
    outputError = err;
    abort.abort(err);
  });

  const controllerOptions = { signal: abort.signal, logger: log };
  const ctx: ActionContext = {
    device,
    operation: new OperationController(device, controllerOptions),
    ramp: new RampController(device, controllerOptions),
    sink: writer.sink,
    log,
  };

  try {
    await device.connect();
    await device.withOperation(() => body(ctx));
  } catch (err) {
    if (outputError) {
      console.error(`Error: ${errorMessage(outputError)}`);
      process.exitCode = 1;
    } else if (isAbortError(err)) {
      log.info("Operation interrupted by user");
    } else {
      console.error(`Error: ${errorMessage(err)}`);
      process.exitCode = 1;
    }
  } finally {
    process.removeListener("SIGINT", onSigint);
    const file = output.file;
    if (file && !file.destroyed) {
      await new Promise<void>((resolve) => file.end(() => resolve()));
    }
  }
}

const program = new Command();

program
  .name("ebc-load")
  .description("CLI for ZKE EBC-Axx electronic loads and battery testers")
  .version("0.1.0");

// ---------- monitor ----------

withDeviceOptions(
  program
    .command("monitor", { isDefault: true })
    .description("Log measurements until interrupted")
).action(async (opts: DeviceCommandOptions) => {
  await runDeviceAction(opts, async ({ operation, sink, log }) => {
    log.info("Starting monitoring mode...");
    await operation.monitor(sink);
  });
});

// ---------- charge-cccv ----------

withDeviceOptions(
  program
    .command("charge-cccv")
    .description("Charge in constant-current / constant-voltage mode")
    .option("-c, --current <amps>", "Charge current in A", toFloat, 1.0)
    .option("-v, --voltage <volts>", "Charge voltage in V", toFloat, 4.0)
    .option("-m, --max-minutes <number>", "Device-side time limit in minutes (0 = none)", toInt, 0)
).action(
  async (opts: DeviceCommandOptions & { current: number; voltage: number; maxMinutes: number }) => {
    await runDeviceAction(opts, ({ operation, sink }) =>
      operation.chargeCccv(opts.voltage, opts.current, { timeout: opts.maxMinutes * 60 }, sink)
    );
  }
);

// ---------- charge ----------

withDeviceOptions(
  program
    .command("charge")
    .description("Charge with a chemistry's built-in profile")
    .requiredOption("--chemistry <name>", `Battery chemistry (${Object.keys(CHEMISTRIES).join(", ")})`)
    .option("-c, --current <amps>", "Charge current in A", toFloat, 1.0)
    .option("-n, --cells <number>", "Number of cells in series", toInt, 1)
    .option("-m, --max-minutes <number>", "Device-side time limit in minutes (0 = none)", toInt, 0)
).action(
  async (
    opts: DeviceCommandOptions & { chemistry: string; current: number; cells: number; maxMinutes: number }
  ) => {
    const mode = CHEMISTRIES[opts.chemistry.toLowerCase()];
    if (mode === undefined) {
      console.error(`Error: Unknown chemistry '${opts.chemistry}'`);
      process.exit(1);
    }
    await runDeviceAction(opts, ({ operation, sink }) =>
      operation.chargePredefined(mode, opts.current, opts.cells, { timeout: opts.maxMinutes * 60 }, sink)
    );
  }
);

// ---------- charge-cv ----------

withDeviceOptions(
  program
    .command("charge-cv")
    .description("Charge to a target voltage with a decaying current ramp")
    .option("-v, --voltage <volts>", "Target voltage in V", toFloat, 4.0)
).action(async (opts: DeviceCommandOptions & { voltage: number }) => {
  await runDeviceAction(opts, ({ ramp, sink }) => ramp.rampChargeToVoltage(opts.voltage, sink));
});

// ---------- discharge-cc ----------

withDeviceOptions(
  program
    .command("discharge-cc")
    .description("Discharge at constant current down to a cutoff voltage")
    .option("-c, --current <amps>", "Discharge current in A", toFloat, 1.0)
    .option("-v, --voltage <volts>", "Cutoff voltage in V", toFloat, 4.0)
    .option("-m, --max-minutes <number>", "Device-side time limit in minutes (0 = none)", toInt, 0)
).action(
  async (opts: DeviceCommandOptions & { current: number; voltage: number; maxMinutes: number }) => {
    await runDeviceAction(opts, ({ operation, sink }) =>
      operation.dischargeCc(opts.current, opts.voltage, { timeout: opts.maxMinutes * 60 }, sink)
    );
  }
);

// ---------- discharge-cp ----------

withDeviceOptions(
  program
    .command("discharge-cp")
    .description("Discharge at constant power down to a cutoff voltage")
    .option("-p, --power <watts>", "Discharge power in W", toFloat, 5.0)
    .option("-v, --voltage <volts>", "Cutoff voltage in V", toFloat, 4.0)
    .option("-m, --max-minutes <number>", "Device-side time limit in minutes (0 = none)", toInt, 0)
).action(
  async (opts: DeviceCommandOptions & { power: number; voltage: number; maxMinutes: number }) => {
    await runDeviceAction(opts, ({ operation, sink }) =>
      operation.dischargeCp(opts.power, opts.voltage, { timeout: opts.maxMinutes * 60 }, sink)
    );
  }
);

// ---------- discharge-cv ----------

withDeviceOptions(
  program
    .command("discharge-cv")
    .description("Discharge to a target voltage with a decaying current ramp")
    .option("-v, --voltage <volts>", "Target voltage in V", toFloat, 4.0)
).action(async (opts: DeviceCommandOptions & { voltage: number }) => {
  await runDeviceAction(opts, ({ ramp, sink }) => ramp.rampDischargeToVoltage(opts.voltage, sink));
});

// ---------- decode ----------

program
  .command("decode")
  .description("Decode a captured command or response frame")
  .argument("<hex...>", "Hex bytes of the frame (e.g. fa 05 00 ...)")
  .action((hexBytes: string[]) => {
    try {
      console.log(describeFrame(hexBytes));
    } catch (err) {
      console.error(`Error: ${errorMessage(err)}`);
      process.exit(1);
    }
  });

await program.parseAsync();
