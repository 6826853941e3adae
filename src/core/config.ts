import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";
import { ConfigError } from "../types/errors";

// rpmbuild tree used inside the Fedora CI container
export const CONTAINER_RPMBUILD_ROOT = "/root/rpmbuild";

export const DEFAULTS = {
  repo: "zen-browser/desktop",
  packageName: "zen-browser",
  assetPattern: "linux-x86_64.tar.xz",
  coprProject: "51ddh4r7h/zen-browser",
  distTag: ".fc41",
  packager: "COPR Build System <copr-build@fedoraproject.org>",
  apiBaseUrl: "https://api.github.com",
} as const;

const ownerName = z
  .string()
  .regex(/^[\w.-]+\/[\w.-]+$/, "expected owner/name");

const ConfigSchema = z.object({
  rpmbuildRoot: z.string().min(1),
  specFile: z.string().min(1),
  sourcesDir: z.string().min(1),
  srpmsDir: z.string().min(1),
  repo: ownerName,
  packageName: z.string().regex(/^[\w.+-]+$/, "invalid package name"),
  assetPattern: z.string().min(1),
  coprProject: ownerName,
  distTag: z.string(),
  packager: z.string().min(1),
  githubToken: z.string().min(1).optional(),
  apiBaseUrl: z.string().url(),
  githubOutput: z.string().min(1).optional(),
});

export type UpdaterConfig = z.infer<typeof ConfigSchema>;

/**
 * Values that may be supplied on the command line, taking precedence over
 * the environment.
 */
export interface ConfigOverrides {
  rpmbuildRoot?: string;
  specFile?: string;
  repo?: string;
  packageName?: string;
  assetPattern?: string;
  coprProject?: string;
  distTag?: string;
}

export type Env = Record<string, string | undefined>;

export interface ResolveRootOptions {
  exists?: (p: string) => boolean;
  home?: string;
}

/**
 * Picks the rpmbuild tree:
 *  - RPM_BUILD_ROOT when set
 *  - the container tree when present
 *  - ~/rpmbuild otherwise
 */
export function resolveRpmbuildRoot(
  env: Env,
  opts: ResolveRootOptions = {},
): string {
  const exists = opts.exists || fs.existsSync;
  const fromEnv = env["RPM_BUILD_ROOT"];
  if (fromEnv) return fromEnv;
  if (exists(CONTAINER_RPMBUILD_ROOT)) return CONTAINER_RPMBUILD_ROOT;
  return path.join(opts.home || os.homedir(), "rpmbuild");
}

export function loadConfig(
  env: Env = process.env,
  overrides: ConfigOverrides = {},
  rootOpts: ResolveRootOptions = {},
): UpdaterConfig {
  const rpmbuildRoot =
    overrides.rpmbuildRoot || resolveRpmbuildRoot(env, rootOpts);
  const packageName =
    overrides.packageName || env["PACKAGE_NAME"] || DEFAULTS.packageName;
  const candidate = {
    rpmbuildRoot,
    specFile:
      overrides.specFile ||
      env["SPEC_FILE"] ||
      path.join(rpmbuildRoot, "SPECS", `${packageName}.spec`),
    sourcesDir: path.join(rpmbuildRoot, "SOURCES"),
    srpmsDir: path.join(rpmbuildRoot, "SRPMS"),
    repo: overrides.repo || env["UPSTREAM_REPO"] || DEFAULTS.repo,
    packageName,
    assetPattern:
      overrides.assetPattern || env["ASSET_PATTERN"] || DEFAULTS.assetPattern,
    coprProject:
      overrides.coprProject || env["COPR_PROJECT"] || DEFAULTS.coprProject,
    distTag: overrides.distTag ?? env["DIST_TAG"] ?? DEFAULTS.distTag,
    packager: env["CHANGELOG_PACKAGER"] || DEFAULTS.packager,
    githubToken: env["GITHUB_TOKEN"] || env["GH_TOKEN"] || undefined,
    apiBaseUrl: (env["GITHUB_API_URL"] || DEFAULTS.apiBaseUrl).replace(
      /\/+$/,
      "",
    ),
    githubOutput: env["GITHUB_OUTPUT"] || undefined,
  };
  const parsed = ConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (i) => `${i.path.join(".")}: ${i.message}`,
    );
    throw new ConfigError("Invalid configuration: " + problems.join("; "));
  }
  return parsed.data;
}
