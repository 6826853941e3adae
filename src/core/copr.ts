import { CommandError } from "../types/errors";
import type { UpdaterConfig } from "./config";
import { describeCommand, runCommand, type CommandRunner } from "./exec";
import { stripWrotePrefix } from "./srpm";

export const COPR_FRONTEND_URL = "https://copr.fedorainfracloud.org";

export interface SubmitOptions {
  // return as soon as the build is queued instead of following it
  nowait?: boolean;
}

export interface SubmitResult {
  buildId?: string;
  statusUrl?: string;
  output: string;
}

export function parseBuildId(stdout: string): string | undefined {
  return /Created builds: (\d+)/.exec(stdout)?.[1];
}

export function buildStatusUrl(buildId: string): string {
  return `${COPR_FRONTEND_URL}/coprs/build/${buildId}/`;
}

export async function submitToCopr(
  srpmPath: string,
  config: Pick<UpdaterConfig, "coprProject">,
  run: CommandRunner = runCommand,
  opts: SubmitOptions = {},
): Promise<SubmitResult> {
  const args = ["build"];
  if (opts.nowait) args.push("--nowait");
  args.push(config.coprProject, stripWrotePrefix(srpmPath));
  const result = await run("copr-cli", args);
  if (result.exitCode !== 0) {
    throw new CommandError(
      `Error submitting to COPR: ${result.stderr.trim()}`,
      {
        command: describeCommand("copr-cli", args),
        exitCode: result.exitCode,
        stdout: result.stdout,
        stderr: result.stderr,
      },
    );
  }
  const buildId = parseBuildId(result.stdout);
  return {
    buildId,
    statusUrl: buildId ? buildStatusUrl(buildId) : undefined,
    output: result.stdout,
  };
}
