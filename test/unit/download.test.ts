import { expect } from "chai";
import * as fs from "node:fs";
import * as path from "node:path";
import { downloadSource } from "../../src/core/download";
import type { ReleaseInfo } from "../../src/core/release";
import { DownloadError } from "../../src/types/errors";
import { fakeFetch, makeTempDir, rejection } from "../helpers/fakes";

const ARCHIVE_URL =
  "https://github.com/example/browser/releases/download/2.4.1b/zen.linux-x86_64.tar.xz";

const release: ReleaseInfo = {
  version: "2.4.1b",
  downloadUrl: ARCHIVE_URL,
  filename: "zen.linux-x86_64.tar.xz",
  size: 11,
};

describe("downloadSource", () => {
  let dir: string;
  beforeEach(() => {
    dir = makeTempDir();
  });
  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("creates SOURCES and stores the archive under its asset name", async () => {
    const sources = path.join(dir, "SOURCES");
    const { fetch } = fakeFetch({
      [ARCHIVE_URL]: () => new Response("hello world"),
    });
    const result = await downloadSource(release, sources, fetch);
    const expectedPath = path.join(sources, "zen.linux-x86_64.tar.xz");
    expect(result).to.deep.equal({ path: expectedPath, bytes: 11 });
    expect(fs.readFileSync(expectedPath, "utf8")).to.equal("hello world");
  });

  it("fails on a non-2xx response", async () => {
    const { fetch } = fakeFetch({});
    const err = await rejection(downloadSource(release, dir, fetch));
    expect(err).to.be.instanceOf(DownloadError);
    if (err instanceof DownloadError) {
      expect(err.status).to.equal(404);
      expect(err.message).to.equal("Error downloading source: 404");
    }
  });

  it("fails when the byte count differs from the asset size", async () => {
    const { fetch } = fakeFetch({
      [ARCHIVE_URL]: () => new Response("hello world"),
    });
    const err = await rejection(
      downloadSource({ ...release, size: 5 }, dir, fetch),
    );
    expect(err).to.be.instanceOf(DownloadError);
    if (err instanceof Error) {
      expect(err.message).to.equal(
        "Error downloading source: expected 5 bytes, got 11",
      );
    }
    expect(fs.existsSync(path.join(dir, "zen.linux-x86_64.tar.xz"))).to.equal(
      false,
    );
  });

  it("wraps network failures", async () => {
    const failing: typeof fetch = async () => {
      throw new Error("getaddrinfo ENOTFOUND github.com");
    };
    const err = await rejection(downloadSource(release, dir, failing));
    expect(err).to.be.instanceOf(DownloadError);
    if (err instanceof DownloadError) {
      expect(err.status).to.equal(undefined);
      expect(err.message).to.equal(
        "Error downloading source: getaddrinfo ENOTFOUND github.com",
      );
    }
  });

  it("streams a body larger than one chunk to disk", async () => {
    const payload = "x".repeat(200 * 1024);
    const { fetch } = fakeFetch({
      [ARCHIVE_URL]: () => new Response(payload),
    });
    const result = await downloadSource(
      { ...release, size: payload.length },
      dir,
      fetch,
    );
    expect(result.bytes).to.equal(payload.length);
    expect(fs.readFileSync(result.path, "utf8")).to.equal(payload);
  });
});
