import * as fs from "node:fs";
import * as path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { DownloadError } from "../types/errors";
import { USER_AGENT, type FetchLike, type ReleaseInfo } from "./release";

export interface DownloadResult {
  path: string;
  bytes: number;
}

/**
 * Fetches the release archive into the rpmbuild SOURCES directory, under the
 * asset's own file name so that it matches the basename of Source0.
 */
export async function downloadSource(
  release: ReleaseInfo,
  sourcesDir: string,
  fetchImpl: FetchLike = fetch,
): Promise<DownloadResult> {
  await fs.promises.mkdir(sourcesDir, { recursive: true });
  const target = path.join(sourcesDir, path.basename(release.filename));

  let res: Response;
  try {
    res = await fetchImpl(release.downloadUrl, {
      redirect: "follow",
      headers: { "User-Agent": USER_AGENT },
    });
  } catch (err) {
    throw new DownloadError(
      "Error downloading source: " +
        (err instanceof Error ? err.message : String(err)),
    );
  }
  if (!res.ok) {
    throw new DownloadError(
      `Error downloading source: ${res.status}`,
      res.status,
    );
  }
  if (!res.body) {
    throw new DownloadError("Error downloading source: empty response body");
  }
  try {
    await pipeline(Readable.fromWeb(res.body), fs.createWriteStream(target));
  } catch (err) {
    await fs.promises.rm(target, { force: true });
    throw new DownloadError(
      "Error saving source file: " +
        (err instanceof Error ? err.message : String(err)),
    );
  }
  const bytes = (await fs.promises.stat(target)).size;
  if (release.size !== undefined && bytes !== release.size) {
    await fs.promises.rm(target, { force: true });
    throw new DownloadError(
      `Error downloading source: expected ${release.size} bytes, got ${bytes}`,
    );
  }
  return { path: target, bytes };
}
