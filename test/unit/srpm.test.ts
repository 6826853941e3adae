import { expect } from "chai";
import * as fs from "node:fs";
import * as path from "node:path";
import {
  buildSrpm,
  findSrpmFromSpec,
  findSrpmInDirectory,
  findSrpmInOutput,
} from "../../src/core/srpm";
import { ArtifactNotFoundError, CommandError } from "../../src/types/errors";
import { fakeRunner, fixture, makeTempDir, rejection } from "../helpers/fakes";

describe("findSrpmInOutput", () => {
  it("takes the Wrote: line from stderr first", () => {
    expect(
      findSrpmInOutput(
        "Wrote: /out/from-stdout-1-1.src.rpm\n",
        "setting SOURCE_DATE_EPOCH=1\nWrote: /out/from-stderr-1-1.src.rpm\n",
      ),
    ).to.equal("/out/from-stderr-1-1.src.rpm");
  });

  it("falls back to stdout and trims the line", () => {
    expect(
      findSrpmInOutput("  Wrote: /out/a-1-1.fc41.src.rpm  \n", "warning: x\n"),
    ).to.equal("/out/a-1-1.fc41.src.rpm");
  });

  it("returns undefined when nothing was written", () => {
    expect(findSrpmInOutput("Executing(%prep)\n", "")).to.equal(undefined);
  });
});

describe("SRPM lookup on disk", () => {
  let root: string;
  let specFile: string;
  let srpmsDir: string;
  beforeEach(() => {
    root = makeTempDir();
    fs.mkdirSync(path.join(root, "SPECS"));
    specFile = path.join(root, "SPECS", "sample-browser.spec");
    fs.writeFileSync(specFile, fixture("sample.spec"));
    srpmsDir = path.join(root, "SRPMS");
  });
  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it("finds the SRPM named after the spec", () => {
    fs.mkdirSync(srpmsDir);
    const expected = path.join(srpmsDir, "sample-browser-2.4.0b-3.fc41.src.rpm");
    fs.writeFileSync(expected, "");
    expect(findSrpmFromSpec(specFile, srpmsDir, ".fc41")).to.equal(expected);
    expect(findSrpmFromSpec(specFile, srpmsDir, ".fc42")).to.equal(undefined);
  });

  it("creates SRPMS and returns undefined when it is empty", () => {
    expect(findSrpmInDirectory(srpmsDir)).to.equal(undefined);
    expect(fs.statSync(srpmsDir).isDirectory()).to.equal(true);
  });

  it("picks the most recently modified SRPM", () => {
    fs.mkdirSync(srpmsDir);
    const older = path.join(srpmsDir, "a-1-1.src.rpm");
    const newer = path.join(srpmsDir, "b-1-1.src.rpm");
    fs.writeFileSync(older, "");
    fs.writeFileSync(newer, "");
    fs.writeFileSync(path.join(srpmsDir, "notes.txt"), "");
    fs.utimesSync(older, new Date(2026, 0, 2), new Date(2026, 0, 2));
    fs.utimesSync(newer, new Date(2026, 0, 1), new Date(2026, 0, 3));
    expect(findSrpmInDirectory(srpmsDir)).to.equal(newer);
  });

  it("runs rpmbuild against the configured tree", async () => {
    const { run, calls } = fakeRunner({
      rpmbuild: { stdout: `Wrote: ${srpmsDir}/sample-browser-2.4.0b-3.fc41.src.rpm\n` },
    });
    const srpm = await buildSrpm(
      { rpmbuildRoot: root, specFile, srpmsDir, distTag: ".fc41" },
      run,
    );
    expect(srpm).to.equal(`${srpmsDir}/sample-browser-2.4.0b-3.fc41.src.rpm`);
    expect(calls).to.deep.equal([
      {
        command: "rpmbuild",
        args: ["-bs", "--define", `_topdir ${root}`, specFile],
      },
    ]);
  });

  it("falls back to scanning SRPMS when the output names nothing", async () => {
    fs.mkdirSync(srpmsDir);
    const built = path.join(srpmsDir, "sample-browser-2.4.0b-3.fc40.src.rpm");
    fs.writeFileSync(built, "");
    const { run } = fakeRunner({ rpmbuild: { stdout: "" } });
    const srpm = await buildSrpm(
      { rpmbuildRoot: root, specFile, srpmsDir, distTag: ".fc41" },
      run,
    );
    expect(srpm).to.equal(built);
  });

  it("surfaces a failing rpmbuild as a CommandError", async () => {
    const { run } = fakeRunner({
      rpmbuild: { exitCode: 1, stderr: "error: Bad source\n" },
    });
    const err = await rejection(
      buildSrpm({ rpmbuildRoot: root, specFile, srpmsDir, distTag: ".fc41" }, run),
    );
    expect(err).to.be.instanceOf(CommandError);
    if (err instanceof CommandError) {
      expect(err.message).to.equal("Error building SRPM: error: Bad source");
      expect(err.exitCode).to.equal(1);
    }
  });

  it("fails when no SRPM can be located", async () => {
    const { run } = fakeRunner({ rpmbuild: { stdout: "nothing\n" } });
    const err = await rejection(
      buildSrpm({ rpmbuildRoot: root, specFile, srpmsDir, distTag: ".fc41" }, run),
    );
    expect(err).to.be.instanceOf(ArtifactNotFoundError);
    if (err instanceof ArtifactNotFoundError) {
      expect(err.stdout).to.equal("nothing\n");
    }
  });
});
