import { z } from "zod";
import { AssetNotFoundError, ReleaseFetchError } from "../types/errors";
import type { UpdaterConfig } from "./config";

export const USER_AGENT = "copr-autobump";

const ReleaseAssetSchema = z.object({
  name: z.string(),
  browser_download_url: z.string().url(),
  size: z.number().int().nonnegative().optional(),
});

const GithubReleaseSchema = z.object({
  tag_name: z.string().min(1),
  published_at: z.string().nullable().optional(),
  prerelease: z.boolean().optional(),
  html_url: z.string().optional(),
  assets: z.array(ReleaseAssetSchema),
});

export type ReleaseAsset = z.infer<typeof ReleaseAssetSchema>;
export type GithubRelease = z.infer<typeof GithubReleaseSchema>;

export interface ReleaseInfo {
  version: string;
  downloadUrl: string;
  filename: string;
  publishedAt?: string;
  size?: number;
}

export type LatestRelease =
  | { kind: "prerelease"; version: string }
  | { kind: "release"; release: ReleaseInfo };

export type FetchLike = typeof fetch;

type ReleaseSource = Pick<UpdaterConfig, "apiBaseUrl" | "repo" | "githubToken">;

export function latestReleaseUrl(config: ReleaseSource): string {
  return `${config.apiBaseUrl}/repos/${config.repo}/releases/latest`;
}

export async function fetchLatestRelease(
  config: ReleaseSource,
  fetchImpl: FetchLike = fetch,
): Promise<GithubRelease> {
  const url = latestReleaseUrl(config);
  const headers: Record<string, string> = {
    Accept: "application/vnd.github+json",
    "User-Agent": USER_AGENT,
  };
  if (config.githubToken) {
    headers["Authorization"] = `Bearer ${config.githubToken}`;
  }
  let res: Response;
  try {
    res = await fetchImpl(url, { headers });
  } catch (err) {
    throw new ReleaseFetchError(
      "Error accessing GitHub API: " +
        (err instanceof Error ? err.message : String(err)),
    );
  }
  if (!res.ok) {
    throw new ReleaseFetchError(
      `Error accessing GitHub API: ${res.status}`,
      res.status,
    );
  }
  let body: unknown;
  try {
    body = await res.json();
  } catch {
    throw new ReleaseFetchError(
      "Error parsing GitHub API response: body is not JSON",
      res.status,
    );
  }
  const parsed = GithubReleaseSchema.safeParse(body);
  if (!parsed.success) {
    throw new ReleaseFetchError(
      "Error parsing GitHub API response: " +
        parsed.error.issues
          .map((i) => `${i.path.join(".") || "<root>"} ${i.message}`)
          .join("; "),
      res.status,
    );
  }
  return parsed.data;
}

// Upstream nightly ("twilight") tags carry a `t`; stable ones look like
// 1.12.9b.
export function isPrereleaseTag(tag: string): boolean {
  return tag.includes("t");
}

export function findArchiveAsset(
  release: GithubRelease,
  pattern: string,
): ReleaseAsset | undefined {
  return release.assets.find((a) => a.name.includes(pattern));
}

export async function resolveLatestRelease(
  config: ReleaseSource & Pick<UpdaterConfig, "assetPattern">,
  fetchImpl: FetchLike = fetch,
): Promise<LatestRelease> {
  const release = await fetchLatestRelease(config, fetchImpl);
  const version = release.tag_name;
  if (release.prerelease || isPrereleaseTag(version)) {
    return { kind: "prerelease", version };
  }
  const asset = findArchiveAsset(release, config.assetPattern);
  if (!asset) {
    throw new AssetNotFoundError(
      `Could not find an asset matching "${config.assetPattern}" ` +
        `in release ${version}`,
    );
  }
  return {
    kind: "release",
    release: {
      version,
      downloadUrl: asset.browser_download_url,
      filename: asset.name,
      publishedAt: release.published_at ?? undefined,
      size: asset.size,
    },
  };
}
