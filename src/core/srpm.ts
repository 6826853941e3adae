import * as fs from "node:fs";
import * as path from "node:path";
import { ArtifactNotFoundError, CommandError } from "../types/errors";
import type { UpdaterConfig } from "./config";
import { describeCommand, runCommand, type CommandRunner } from "./exec";
import { expectedSrpmName } from "./spec-file";

const SRPM_SUFFIX = ".src.rpm";
const WROTE_PREFIX = "Wrote: ";

export function stripWrotePrefix(value: string): string {
  return value.startsWith(WROTE_PREFIX)
    ? value.slice(WROTE_PREFIX.length)
    : value;
}

/** rpmbuild announces artifacts as `Wrote: <path>`; stderr is checked first. */
export function findSrpmInOutput(
  stdout: string,
  stderr: string,
): string | undefined {
  for (const stream of [stderr, stdout]) {
    for (const line of stream.split("\n")) {
      const trimmed = line.trim();
      if (trimmed.endsWith(SRPM_SUFFIX)) return stripWrotePrefix(trimmed);
    }
  }
  return undefined;
}

export function findSrpmFromSpec(
  specFile: string,
  srpmsDir: string,
  distTag: string,
): string | undefined {
  let content: string;
  try {
    content = fs.readFileSync(specFile, "utf8");
  } catch {
    return undefined;
  }
  const name = expectedSrpmName(content, distTag);
  if (!name) return undefined;
  const expected = path.join(srpmsDir, name);
  return fs.existsSync(expected) ? expected : undefined;
}

export function findSrpmInDirectory(srpmsDir: string): string | undefined {
  fs.mkdirSync(srpmsDir, { recursive: true });
  const candidates = fs
    .readdirSync(srpmsDir, { withFileTypes: true })
    .filter((e) => e.isFile() && e.name.endsWith(SRPM_SUFFIX))
    .map((e) => {
      const full = path.join(srpmsDir, e.name);
      return { full, mtime: fs.statSync(full).mtimeMs };
    })
    .sort((a, b) => b.mtime - a.mtime);
  return candidates[0]?.full;
}

type SrpmConfig = Pick<
  UpdaterConfig,
  "rpmbuildRoot" | "specFile" | "srpmsDir" | "distTag"
>;

export async function buildSrpm(
  config: SrpmConfig,
  run: CommandRunner = runCommand,
): Promise<string> {
  const args = [
    "-bs",
    "--define",
    `_topdir ${config.rpmbuildRoot}`,
    config.specFile,
  ];
  const result = await run("rpmbuild", args);
  if (result.exitCode !== 0) {
    throw new CommandError(`Error building SRPM: ${result.stderr.trim()}`, {
      command: describeCommand("rpmbuild", args),
      exitCode: result.exitCode,
      stdout: result.stdout,
      stderr: result.stderr,
    });
  }
  const srpmPath =
    findSrpmInOutput(result.stdout, result.stderr) ||
    findSrpmFromSpec(config.specFile, config.srpmsDir, config.distTag) ||
    findSrpmInDirectory(config.srpmsDir);
  if (!srpmPath) {
    throw new ArtifactNotFoundError(
      "Could not find built SRPM path in output",
      result.stdout,
      result.stderr,
    );
  }
  return srpmPath;
}
