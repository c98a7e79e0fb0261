/**
 * Tests for FASTA line classification
 */

import { describe, expect, test } from "vitest";
import { classifyLine, extractCodes, isMetadataLine } from "../../src/formats/fasta/classifier";

describe("classifyLine", () => {
  test("strips the marker from description lines", () => {
    expect(classifyLine(">chr1 assembled")).toEqual({
      kind: "description",
      text: "chr1 assembled",
    });
  });

  test("trims the line before looking for a marker", () => {
    expect(classifyLine("  ;note  ")).toEqual({ kind: "comment", text: "note" });
    expect(classifyLine("\t>seq\r")).toEqual({ kind: "description", text: "seq" });
  });

  test("keeps whitespace that follows the marker", () => {
    expect(classifyLine("> spaced")).toEqual({ kind: "description", text: " spaced" });
  });

  test("marker-only lines are metadata with empty text", () => {
    expect(classifyLine(">")).toEqual({ kind: "description", text: "" });
    expect(classifyLine(";")).toEqual({ kind: "comment", text: "" });
  });

  test("empty and whitespace-only lines are blank", () => {
    expect(classifyLine("")).toEqual({ kind: "blank" });
    expect(classifyLine("   \t ")).toEqual({ kind: "blank" });
  });

  test("anything else is code data, without alphabet checks", () => {
    expect(classifyLine("  ACGT  ")).toEqual({ kind: "code", text: "ACGT" });
    expect(classifyLine("N-*x9")).toEqual({ kind: "code", text: "N-*x9" });
  });
});

describe("isMetadataLine", () => {
  test("accepts descriptions and comments only", () => {
    expect(isMetadataLine(classifyLine(">a"))).toBe(true);
    expect(isMetadataLine(classifyLine(";a"))).toBe(true);
    expect(isMetadataLine(classifyLine("ACGT"))).toBe(false);
    expect(isMetadataLine(classifyLine(""))).toBe(false);
  });
});

describe("extractCodes", () => {
  test("yields one code per non-whitespace character", () => {
    expect([...extractCodes("AC GT\tN")]).toEqual(["A", "C", "G", "T", "N"]);
  });

  test("yields nothing for empty text", () => {
    expect([...extractCodes("")]).toEqual([]);
  });
});
