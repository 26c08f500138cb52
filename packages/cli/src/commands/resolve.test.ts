import { describe, it } from "mocha";
import { expect } from "chai";
import {
  createAnalysisContext,
  type AnalysisContext,
} from "@unitgraph/frontend";
import { resolveCommand, toIdentifier } from "./resolve.js";

const createMockContext = (): AnalysisContext => {
  const result = createAnalysisContext(
    { useMockRuntime: true, mockRuntime: { "rt:core": "unit A" } },
    { cwd: "/nonexistent/unitgraph-cli" }
  );
  if (!result.ok) {
    throw new Error("test context rejected");
  }
  return result.value;
};

describe("Resolve Command", () => {
  it("should print the resolved contents", () => {
    const result = resolveCommand(createMockContext(), "rt:core");

    expect(result.ok).to.equal(true);
    if (!result.ok) return;
    expect(result.value).to.deep.equal({ text: "unit A", diagnostics: [] });
  });

  it("should fail for an identifier the chain cannot serve", () => {
    const result = resolveCommand(createMockContext(), "rt:missing");

    expect(result.ok).to.equal(false);
    if (result.ok) return;
    expect(result.error.diagnostics.map((d) => d.code)).to.deep.equal([
      "UG2001",
    ]);
  });

  describe("toIdentifier", () => {
    it("should keep scheme-qualified identifiers", () => {
      expect(toIdentifier("pkg:util/index.ts", "/work")).to.equal(
        "pkg:util/index.ts"
      );
    });

    it("should take plain arguments as file paths", () => {
      expect(toIdentifier("src/a.ts", "/work")).to.equal(
        "file:///work/src/a.ts"
      );
    });
  });
});
