import { describe, it } from "mocha";
import { expect } from "chai";
import { parseScript } from "./script.js";

describe("parseScript", () => {
  const uri = "file:///proj/src/main.ts";

  it("should collect imports, bindings and exports", () => {
    const parsed = parseScript(
      uri,
      [
        'import def, { a, b as c } from "./dep.js";',
        'import "rt:core";',
        'export { d as e } from "util/mod.js";',
        'export * from "./star.js";',
        "const local = 1;",
        "export { local as renamed };",
        "export default local;",
        "export const z = 2;",
      ].join("\n")
    );

    expect(parsed.imports).to.deep.equal([
      "file:///proj/src/dep.js",
      "rt:core",
      "pkg:util/mod.js",
      "file:///proj/src/star.js",
    ]);
    expect(parsed.bindings).to.deep.equal([
      {
        localName: "def",
        importedName: "default",
        from: "file:///proj/src/dep.js",
      },
      { localName: "a", importedName: "a", from: "file:///proj/src/dep.js" },
      { localName: "c", importedName: "b", from: "file:///proj/src/dep.js" },
    ]);
    expect(parsed.reExports).to.deep.equal([
      { exportedName: "e", importedName: "d", from: "pkg:util/mod.js" },
    ]);
    expect(parsed.starExports).to.deep.equal(["file:///proj/src/star.js"]);
    expect([...parsed.exports.entries()]).to.deep.equal([
      ["renamed", "local"],
      ["default", "local"],
      ["z", "z"],
    ]);
    expect(parsed.diagnostics).to.deep.equal([]);
  });

  it("should export function and class declarations", () => {
    const parsed = parseScript(
      uri,
      [
        "export function run() {}",
        "export class Task {}",
        "export default class Job {}",
        "function hidden() {}",
      ].join("\n")
    );

    expect([...parsed.exports.entries()]).to.deep.equal([
      ["run", "run"],
      ["Task", "Task"],
      ["default", "Job"],
    ]);
  });

  it("should export an anonymous default function as default", () => {
    const parsed = parseScript(uri, "export default function () {}\n");

    expect([...parsed.exports.entries()]).to.deep.equal([
      ["default", "default"],
    ]);
  });

  it("should list an identifier imported twice only once", () => {
    const parsed = parseScript(
      uri,
      'import { a } from "rt:core";\nimport { b } from "rt:core";\n'
    );

    expect(parsed.imports).to.deep.equal(["rt:core"]);
    expect(parsed.bindings.map((b) => b.localName)).to.deep.equal(["a", "b"]);
  });

  it("should report syntax errors with their position", () => {
    const parsed = parseScript(uri, "const ok = 1;\nconst = 2;\n");

    expect(parsed.diagnostics.length).to.be.greaterThan(0);
    const [first] = parsed.diagnostics;
    expect(first?.code).to.equal("UG4002");
    expect(first?.location?.file).to.equal(uri);
    expect(first?.location?.line).to.equal(2);
  });
});
