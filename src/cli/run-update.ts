#!/usr/bin/env node
import { Command } from "commander";
import { loadConfig, type ConfigOverrides } from "../core/config";
import {
  consoleLogger,
  runUpdate,
  type Logger,
  type UpdateOptions,
} from "../core/update";
import { ArtifactNotFoundError, CommandError } from "../types/errors";

export type CliOptions = {
  rpmbuildRoot?: string;
  spec?: string;
  repo?: string;
  package?: string;
  coprProject?: string;
  assetPattern?: string;
  distTag?: string;
  force?: boolean;
  dryRun?: boolean;
  submit: boolean;
  nowait?: boolean;
};

export function createProgram(): Command {
  return new Command()
    .name("copr-autobump")
    .description(
      "Check upstream for a new release, refresh the RPM spec " +
        "and queue the SRPM on COPR",
    )
    .option(
      "--rpmbuild-root <dir>",
      "rpmbuild tree (default: $RPM_BUILD_ROOT, /root/rpmbuild or ~/rpmbuild)",
    )
    .option(
      "--spec <file>",
      "spec file to update (default: <root>/SPECS/<package>.spec)",
    )
    .option("--repo <owner/name>", "upstream GitHub repository")
    .option("--package <name>", "RPM package name")
    .option("--copr-project <owner/name>", "COPR project receiving the build")
    .option(
      "--asset-pattern <text>",
      "substring identifying the release archive",
    )
    .option(
      "--dist-tag <tag>",
      "value of %{?dist} used to predict the SRPM name",
    )
    .option(
      "--force",
      "rebuild even when the spec is already at the latest version",
    )
    .option(
      "--dry-run",
      "report a new version without downloading or building",
    )
    .option("--no-submit", "build the SRPM but do not submit it to COPR")
    .option("--nowait", "do not wait for the COPR build to finish");
}

export function toOverrides(opts: CliOptions): ConfigOverrides {
  return {
    rpmbuildRoot: opts.rpmbuildRoot,
    specFile: opts.spec,
    repo: opts.repo,
    packageName: opts.package,
    coprProject: opts.coprProject,
    assetPattern: opts.assetPattern,
    distTag: opts.distTag,
  };
}

export function toUpdateOptions(opts: CliOptions): UpdateOptions {
  return {
    force: opts.force,
    dryRun: opts.dryRun,
    submit: opts.submit,
    nowait: opts.nowait,
  };
}

export function reportFailure(err: unknown, logger: Logger): void {
  if (!(err instanceof Error)) {
    logger.error(`failed: ${String(err)}`);
    return;
  }
  logger.error(`failed: ${err.name}: ${err.message}`);
  if (err instanceof CommandError || err instanceof ArtifactNotFoundError) {
    const stdout = err.stdout.trim();
    const stderr = err.stderr.trim();
    if (stdout) logger.error(`stdout: ${stdout}`);
    if (stderr) logger.error(`stderr: ${stderr}`);
  }
}

async function main() {
  const opts = createProgram().parse(process.argv).opts<CliOptions>();
  const config = loadConfig(process.env, toOverrides(opts));
  const outcome = await runUpdate(
    config,
    { logger: consoleLogger },
    toUpdateOptions(opts),
  );
  consoleLogger.info(`Done (${outcome.status} ${outcome.version})`);
}

if (require.main === module) {
  main().catch((err: unknown) => {
    reportFailure(err, consoleLogger);
    process.exit(1);
  });
}
