import * as fs from "node:fs";

export type CiOutputs = Record<string, string>;

/**
 * Appends step outputs in the `key=value` format read by GitHub Actions.
 * Does nothing outside CI, where no output file is configured.
 */
export function writeCiOutputs(
  file: string | undefined,
  outputs: CiOutputs,
): void {
  if (!file) return;
  const lines = Object.entries(outputs)
    .map(([key, value]) => `${key}=${value}\n`)
    .join("");
  fs.appendFileSync(file, lines);
}
