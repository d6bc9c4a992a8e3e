/**
 * Destination of the CLI's CSV output.
 */

import fs from "node:fs";

export interface OutputOptions {
  /** File to write; stdout when omitted */
  output?: string;
  /** Overwrite an existing file */
  force?: boolean;
  /** Append to an existing file */
  append?: boolean;
}

export interface OutputTarget {
  out: NodeJS.WritableStream;
  /** Whether a CSV header line is still needed */
  header: boolean;
  /** The opened file stream, or null for stdout */
  file: fs.WriteStream | null;
}

/**
 * Open the output destination. The file is opened synchronously so that an
 * unwritable path fails here, before any device is touched.
 *
 * @throws Error if the file exists and neither `force` nor `append` is set,
 *         or if it cannot be opened
 */
export function openOutput(opts: OutputOptions): OutputTarget {
  if (!opts.output) {
    return { out: process.stdout, header: true, file: null };
  }

  const exists = fs.existsSync(opts.output);
  if (exists && !(opts.force || opts.append)) {
    throw new Error(
      `Output file '${opts.output}' already exists. Use -f/--force to overwrite or -a/--append to append.`
    );
  }

  const appending = Boolean(opts.append) && exists;
  const header = !appending || fs.statSync(opts.output).size === 0;
  const fd = fs.openSync(opts.output, appending ? "a" : "w");
  const file = fs.createWriteStream(opts.output, { fd });
  return { out: file, header, file };
}
