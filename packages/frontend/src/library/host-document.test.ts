import { describe, it } from "mocha";
import { expect } from "chai";
import { extractScriptImports, isHostDocument } from "./host-document.js";

describe("Host documents", () => {
  it("should recognize HTML identifiers", () => {
    expect(isHostDocument("file:///proj/index.html")).to.equal(true);
    expect(isHostDocument("file:///proj/INDEX.HTM")).to.equal(true);
    expect(isHostDocument("file:///proj/index.ts")).to.equal(false);
  });

  it("should list external scripts once, in document order", () => {
    const contents = [
      "<html><head>",
      '<script src="./a.js"></script>',
      "<script>inline();</script>",
      "</head><body>",
      '<script type="module" src="lib/b.js"></script>',
      '<script src="./a.js"></script>',
      '<script src="  "></script>',
      "</body></html>",
    ].join("\n");

    expect(
      extractScriptImports("file:///proj/index.html", contents)
    ).to.deep.equal(["file:///proj/a.js", "pkg:lib/b.js"]);
  });

  it("should find nothing in a document without scripts", () => {
    expect(
      extractScriptImports("file:///proj/index.html", "<p>static</p>")
    ).to.deep.equal([]);
  });
});
