import { describe, it, expect } from "vitest";
import { parseCliArgs, UsageError } from "../src/app/args.js";

describe("parseCliArgs", () => {
  it("parses a bare convert", () => {
    expect(parseCliArgs(["convert", "doc.pdf"])).toEqual({
      kind: "convert",
      pdfPath: "doc.pdf",
      output: undefined,
      save: false,
      html: undefined,
      copy: false,
      open: false,
      apiKey: undefined,
    });
  });

  it("parses convert options", () => {
    expect(
      parseCliArgs([
        "convert",
        "doc.pdf",
        "-o",
        "out.md",
        "--html",
        "out.html",
        "--copy",
        "--open",
        "--api-key",
        "test-key",
      ])
    ).toEqual({
      kind: "convert",
      pdfPath: "doc.pdf",
      output: "out.md",
      save: false,
      html: "out.html",
      copy: true,
      open: true,
      apiKey: "test-key",
    });
  });

  it("rejects --output together with --save", () => {
    expect(() => parseCliArgs(["convert", "doc.pdf", "-o", "x.md", "--save"])).toThrow(UsageError);
  });

  it("requires exactly one PDF for convert", () => {
    expect(() => parseCliArgs(["convert"])).toThrow("convert takes exactly one PDF path");
    expect(() => parseCliArgs(["convert", "a.pdf", "b.pdf"])).toThrow(UsageError);
  });

  it("parses save-key", () => {
    expect(parseCliArgs(["save-key", "test-key"])).toEqual({ kind: "save-key", apiKey: "test-key" });
  });

  it("rejects save-key without a key", () => {
    expect(() => parseCliArgs(["save-key"])).toThrow("save-key takes exactly one key");
  });

  it("parses config-path", () => {
    expect(parseCliArgs(["config-path"])).toEqual({ kind: "config-path" });
  });

  it("returns help for no arguments or --help", () => {
    expect(parseCliArgs([])).toEqual({ kind: "help" });
    expect(parseCliArgs(["convert", "doc.pdf", "--help"])).toEqual({ kind: "help" });
  });

  it("turns unknown options into UsageError", () => {
    expect(() => parseCliArgs(["convert", "doc.pdf", "--bogus"])).toThrow(UsageError);
  });

  it("rejects unknown commands", () => {
    expect(() => parseCliArgs(["frobnicate"])).toThrow("Unknown command: frobnicate");
  });
});
