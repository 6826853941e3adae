import { writeCiOutputs } from "./ci-output";
import type { UpdaterConfig } from "./config";
import { submitToCopr } from "./copr";
import { downloadSource } from "./download";
import { runCommand, type CommandRunner } from "./exec";
import { resolveLatestRelease, type FetchLike } from "./release";
import { applySpecUpdate, readCurrentVersion, readSpecFile } from "./spec-file";
import { buildSrpm } from "./srpm";

export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const LOG_PREFIX = "[autobump]";

export const consoleLogger: Logger = {
  info: (message) => console.log(`${LOG_PREFIX} ${message}`),
  warn: (message) => console.warn(`${LOG_PREFIX} ${message}`),
  error: (message) => console.error(`${LOG_PREFIX} ${message}`),
};

export interface UpdateDeps {
  fetch?: FetchLike;
  run?: CommandRunner;
  logger?: Logger;
  now?: () => Date;
}

export interface UpdateOptions {
  force?: boolean;
  dryRun?: boolean;
  submit?: boolean;
  nowait?: boolean;
}

export type UpdateOutcome =
  | { status: "prerelease"; version: string }
  | { status: "up-to-date"; version: string }
  | { status: "pending"; currentVersion: string; version: string }
  | { status: "built"; version: string; srpmPath: string }
  | {
      status: "submitted";
      version: string;
      srpmPath: string;
      buildId?: string;
      statusUrl?: string;
    };

export function isUpdated(outcome: UpdateOutcome): boolean {
  return outcome.status === "built" || outcome.status === "submitted";
}

export async function runUpdate(
  config: UpdaterConfig,
  deps: UpdateDeps = {},
  opts: UpdateOptions = {},
): Promise<UpdateOutcome> {
  const outcome = await performUpdate(config, deps, opts);
  writeCiOutputs(config.githubOutput, {
    updated: String(isUpdated(outcome)),
    version: outcome.version,
  });
  return outcome;
}

async function performUpdate(
  config: UpdaterConfig,
  deps: UpdateDeps,
  opts: UpdateOptions,
): Promise<UpdateOutcome> {
  const fetchImpl = deps.fetch || fetch;
  const run = deps.run || runCommand;
  const log = deps.logger || consoleLogger;
  const now = deps.now || (() => new Date());
  const submit = opts.submit ?? true;

  log.info(`Checking ${config.repo} for new releases...`);
  const latest = await resolveLatestRelease(config, fetchImpl);
  if (latest.kind === "prerelease") {
    log.info(`Skipping twilight/nightly build version: ${latest.version}`);
    return { status: "prerelease", version: latest.version };
  }
  const release = latest.release;

  const currentVersion = readCurrentVersion(readSpecFile(config.specFile));
  if (currentVersion === release.version && !opts.force) {
    log.info(`Already at the latest version: ${currentVersion}`);
    return { status: "up-to-date", version: currentVersion };
  }
  if (currentVersion === release.version) {
    log.warn(`Rebuilding ${currentVersion} (forced)`);
  } else {
    log.info(
      `New version found: ${release.version} (current ${currentVersion})`,
    );
  }
  if (opts.dryRun) {
    log.info("Dry run: leaving sources and spec file untouched");
    return { status: "pending", currentVersion, version: release.version };
  }

  log.info(`Downloading ${release.downloadUrl}...`);
  const downloaded = await downloadSource(
    release,
    config.sourcesDir,
    fetchImpl,
  );
  log.info(`Downloaded ${downloaded.bytes} bytes to ${downloaded.path}`);

  log.info(`Updating spec file ${config.specFile}...`);
  applySpecUpdate(config.specFile, {
    version: release.version,
    sourceUrl: release.downloadUrl,
    date: now(),
    packager: config.packager,
  });

  log.info("Building SRPM...");
  const srpmPath = await buildSrpm(config, run);
  log.info(`Found SRPM: ${srpmPath}`);
  if (!submit) {
    log.info("Submission disabled; SRPM left in place");
    return { status: "built", version: release.version, srpmPath };
  }

  log.info(`Submitting ${srpmPath} to COPR project ${config.coprProject}...`);
  const submitted = await submitToCopr(srpmPath, config, run, {
    nowait: opts.nowait,
  });
  if (submitted.buildId) {
    log.info(`Build ID: ${submitted.buildId}`);
    log.info(`Build status URL: ${submitted.statusUrl}`);
  } else {
    log.warn("copr-cli did not report a build id");
  }
  return {
    status: "submitted",
    version: release.version,
    srpmPath,
    buildId: submitted.buildId,
    statusUrl: submitted.statusUrl,
  };
}
