import { describe, expect, it, vi } from "vitest";

import { VERSION, isNoResponseCode, parseTimestamp, resolveScriptOptions } from "../src/config";
import {
  DataIntegrityError,
  PreconditionError,
  QsfExportError,
  StreamIOError,
  StructuralParseError,
  formatError,
} from "../src/errors";
import { consoleLogger } from "../src/logger";

describe("configuration", () => {
  it("fills script option defaults", () => {
    expect(resolveScriptOptions()).toEqual({ toolName: "qsf-export", toolVersion: VERSION, library: "readr" });
    expect(resolveScriptOptions({ library: "vroom" }).library).toBe("vroom");
  });

  it("parses platform timestamps as UTC", () => {
    expect(parseTimestamp("2024-02-29 23:59:59")?.toISOString()).toBe("2024-02-29T23:59:59.000Z");
    expect(parseTimestamp("2023-02-29 00:00:00")).toBeNull();
    expect(parseTimestamp("2024-02-01T00:00:00Z")).toBeNull();
    expect(parseTimestamp("")).toBeNull();
  });

  it("recognizes no-response codes", () => {
    expect(isNoResponseCode("-99")).toBe(true);
    expect(isNoResponseCode("0")).toBe(true);
    expect(isNoResponseCode("1")).toBe(false);
  });
});

describe("errors", () => {
  it("keeps recoverable errors under one base class", () => {
    expect(new PreconditionError("x")).toBeInstanceOf(QsfExportError);
    expect(new StructuralParseError("MissingMetadata", "x")).toBeInstanceOf(QsfExportError);
    expect(new StreamIOError("x", new Error("y"))).toBeInstanceOf(QsfExportError);
    expect(new DataIntegrityError("QID1", "_1_QID1", "a", "b")).not.toBeInstanceOf(QsfExportError);
  });

  it("formats errors as one line", () => {
    expect(formatError(new StructuralParseError("MalformedElement", "bad payload", { elementIndex: 3, elementTag: "FL" }))).toBe(
      "MalformedElement: bad payload (element 3 FL)"
    );
    expect(formatError(new StructuralParseError("MissingMetadata", "no entry"))).toBe("MissingMetadata: no entry");
    expect(formatError(new DataIntegrityError("QID1", "_2_QID1", "a", "b"))).toBe(
      "cannot add 'b' for '_2_QID1': key 'QID1' already holds 'a'"
    );
    expect(formatError("plain")).toBe("plain");
    expect(formatError(42)).toBe("An unexpected error occurred");
  });

  it("keeps the underlying cause", () => {
    const cause = new Error("EPIPE");
    expect(new StreamIOError("could not write csv", cause).cause).toBe(cause);
  });
});

describe("logging", () => {
  it("prefixes console output", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const info = vi.spyOn(console, "info").mockImplementation(() => {});
    consoleLogger.warn("could not convert", { field: "progress" });
    consoleLogger.info("plain message");
    expect(warn).toHaveBeenCalledWith("[qsf-export]", "could not convert", { field: "progress" });
    expect(info).toHaveBeenCalledWith("[qsf-export]", "plain message");
    warn.mockRestore();
    info.mockRestore();
  });
});
