import { expect } from "chai";
import * as fs from "node:fs";
import * as path from "node:path";
import { writeCiOutputs } from "../../src/core/ci-output";
import { makeTempDir } from "../helpers/fakes";

describe("writeCiOutputs", () => {
  let dir: string;
  beforeEach(() => {
    dir = makeTempDir();
  });
  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("appends key=value lines", () => {
    const file = path.join(dir, "output");
    fs.writeFileSync(file, "earlier=1\n");
    writeCiOutputs(file, { updated: "true", version: "2.4.1b" });
    expect(fs.readFileSync(file, "utf8")).to.equal(
      "earlier=1\nupdated=true\nversion=2.4.1b\n",
    );
  });

  it("does nothing without an output file", () => {
    writeCiOutputs(undefined, { updated: "false" });
    expect(fs.readdirSync(dir)).to.deep.equal([]);
  });
});
