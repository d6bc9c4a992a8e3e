/**
 * CSV output for measurement samples.
 */

import type { Measurement } from "./frame.js";

type Column = [header: string, value: (m: Measurement) => string | number];

const COLUMNS: Column[] = [
  ["regime", (m) => m.regime],
  ["mode", (m) => m.mode],
  ["state", (m) => m.state],
  ["i_measured", (m) => m.iMeasured],
  ["u_measured", (m) => m.uMeasured],
  ["stored_charge", (m) => m.storedCharge],
  ["i_setting", (m) => m.iSetting],
  ["u_cutoff", (m) => m.uCutoff],
  ["max_time", (m) => m.maxTime],
  ["ident", (m) => m.ident],
  ["unk1", (m) => m.unknown],
  ["raw_data", (m) => m.raw],
];

export const CSV_HEADER = ["time", ...COLUMNS.map(([header]) => header)];

export interface CsvWriterOptions {
  /** Write the header line before the first row. Default: true */
  header?: boolean;
  /** Clock returning Unix time in ms. Default: Date.now */
  now?: () => number;
}

/**
 * Writes one CSV row per measurement, prefixed with the Unix time in
 * seconds. Usable directly as a measurement sink via {@link CsvWriter.sink}.
 */
export class CsvWriter {
  private readonly out: NodeJS.WritableStream;
  private readonly now: () => number;
  private headerPending: boolean;

  constructor(out: NodeJS.WritableStream, options: CsvWriterOptions = {}) {
    this.out = out;
    this.now = options.now ?? Date.now;
    this.headerPending = options.header ?? true;
  }

  write(sample: Measurement): void {
    if (this.headerPending) {
      this.out.write(`${CSV_HEADER.join(",")}\n`);
      this.headerPending = false;
    }
    const time = this.now() / 1000;
    const fields = COLUMNS.map(([, value]) => String(value(sample)));
    this.out.write(`${[String(time), ...fields].join(",")}\n`);
  }

  readonly sink = (sample: Measurement): void => this.write(sample);
}
