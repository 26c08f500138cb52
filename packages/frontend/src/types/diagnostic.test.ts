/**
 * Tests for diagnostic types
 */

import { describe, it } from "mocha";
import { expect } from "chai";
import {
  createDiagnostic,
  formatDiagnostic,
  createDiagnosticsCollector,
  addDiagnostic,
  mergeDiagnostics,
  singleDiagnostic,
  isError,
} from "./diagnostic.js";

describe("Diagnostics", () => {
  describe("formatDiagnostic", () => {
    it("should format a diagnostic with location", () => {
      const diagnostic = createDiagnostic(
        "UG4002",
        "error",
        "Unexpected token",
        { file: "file:///proj/main.ts", line: 3, column: 7, length: 1 }
      );

      expect(formatDiagnostic(diagnostic)).to.equal(
        "file:///proj/main.ts:3:7 error UG4002: Unexpected token"
      );
    });

    it("should append the hint", () => {
      const diagnostic = createDiagnostic(
        "UG2002",
        "error",
        'No resolver claims "npm:left-pad"',
        undefined,
        "Resolver chain: mock-runtime, file, package"
      );

      expect(formatDiagnostic(diagnostic)).to.equal(
        'error UG2002: No resolver claims "npm:left-pad" Hint: Resolver chain: mock-runtime, file, package'
      );
    });
  });

  describe("DiagnosticsCollector", () => {
    it("should add diagnostics immutably", () => {
      const empty = createDiagnosticsCollector();
      const next = addDiagnostic(
        empty,
        createDiagnostic("UG1001", "error", "runtimePath is required")
      );

      expect(empty.diagnostics).to.have.length(0);
      expect(next.diagnostics).to.have.length(1);
      expect(next.hasErrors).to.equal(true);
    });

    it("should not count warnings as errors", () => {
      const collector = singleDiagnostic(
        createDiagnostic("UG4001", "warning", "Import skipped")
      );
      expect(collector.hasErrors).to.equal(false);
    });

    it("should merge collectors in order", () => {
      const merged = mergeDiagnostics(
        singleDiagnostic(createDiagnostic("UG1001", "error", "first")),
        singleDiagnostic(createDiagnostic("UG1002", "info", "second"))
      );

      expect(merged.diagnostics.map((d) => d.code)).to.deep.equal([
        "UG1001",
        "UG1002",
      ]);
      expect(merged.hasErrors).to.equal(true);
    });
  });

  it("should identify error severity", () => {
    expect(isError(createDiagnostic("UG3001", "error", "sealed"))).to.equal(
      true
    );
    expect(isError(createDiagnostic("UG3001", "info", "sealed"))).to.equal(
      false
    );
  });
});
