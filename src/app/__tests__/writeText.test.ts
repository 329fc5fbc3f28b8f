import { describe, it, expect, vi } from "vitest";
import {
  emitRecords,
  previewText,
  rasterizeOrFail,
  validateYear,
  writeTextToHistory,
  type Reporter,
} from "../writeText.js";
import type { RecordStore } from "../../git/gitRecorder.js";
import {
  EmptyResultError,
  InvalidYearError,
  PreconditionMissingError,
} from "../../errors.js";
import { rasterize } from "../../raster/rasterize.js";

const quiet = { onWarning: () => {} };

function fakeStore(options: { ready?: boolean; failOn?: number[] } = {}) {
  const timestamps: string[] = [];
  const store: RecordStore = {
    isReady: vi.fn(() => options.ready ?? true),
    recordAt: vi.fn((timestamp: string) => {
      timestamps.push(timestamp);
      return !(options.failOn ?? []).includes(timestamps.length);
    }),
  };
  return { store, timestamps };
}

function memoryReporter() {
  const logs: string[] = [];
  const progress: string[] = [];
  const reporter: Reporter = {
    log: (message) => logs.push(message),
    progress: (message) => progress.push(message),
  };
  return { reporter, logs, progress };
}

describe("validateYear", () => {
  it("accepts the inclusive range", () => {
    expect(() => validateYear(2000)).not.toThrow();
    expect(() => validateYear(2024)).not.toThrow();
    expect(() => validateYear(2100)).not.toThrow();
  });

  it("rejects years outside the range", () => {
    expect(() => validateYear(1999)).toThrow(InvalidYearError);
    expect(() => validateYear(2101)).toThrow(InvalidYearError);
    expect(() => validateYear(1999)).toThrow(
      "Year 1999 seems unusual. Please use a year between 2000-2100.",
    );
  });

  it("rejects non-integer years", () => {
    expect(() => validateYear(2024.5)).toThrow(InvalidYearError);
    expect(() => validateYear(Number.NaN)).toThrow(InvalidYearError);
  });
});

describe("rasterizeOrFail", () => {
  it("throws when nothing can be rendered", () => {
    expect(() => rasterizeOrFail("", quiet)).toThrow(EmptyResultError);
    expect(() => rasterizeOrFail("###", quiet)).toThrow("No valid characters to render.");
  });

  it("returns the bitmap otherwise", () => {
    expect(rasterizeOrFail("1", quiet)).toEqual(rasterize("1", quiet));
  });
});

describe("previewText", () => {
  it("renders the bitmap", () => {
    expect(previewText("1", quiet)).toContain("Total width: 4 columns (max: 52)");
  });

  it("fails on empty input", () => {
    expect(() => previewText("", quiet)).toThrow(EmptyResultError);
  });
});

describe("emitRecords", () => {
  it("records every lit cell at noon in column-major order", () => {
    const { store, timestamps } = fakeStore();
    const { reporter, logs, progress } = memoryReporter();

    const summary = emitRecords(rasterize("1", quiet), 2024, store, reporter);

    expect(summary).toEqual({ total: 8, succeeded: 8, failed: 0 });
    expect(timestamps).toEqual([
      "2024-01-09T12:00:00",
      "2024-01-12T12:00:00",
      "2024-01-15T12:00:00",
      "2024-01-16T12:00:00",
      "2024-01-17T12:00:00",
      "2024-01-18T12:00:00",
      "2024-01-19T12:00:00",
      "2024-01-26T12:00:00",
    ]);
    expect(progress).toEqual(["Progress: 8/8 commits"]);
    expect(logs).toEqual(["\nCompleted: 8 commits generated"]);
  });

  it("keeps going past failures and tallies them", () => {
    const { store, timestamps } = fakeStore({ failOn: [2, 5] });
    const { reporter, logs, progress } = memoryReporter();

    const summary = emitRecords(rasterize("1", quiet), 2024, store, reporter);

    expect(timestamps).toHaveLength(8);
    expect(summary).toEqual({ total: 8, succeeded: 6, failed: 2 });
    expect(progress).toEqual([]);
    expect(logs).toEqual(["\nCompleted: 6 commits generated (2 failed)"]);
  });

  it("reports progress every 10 commits", () => {
    // 8 = 2 lit cells on each of 5 ink rows
    const { store } = fakeStore();
    const { reporter, progress } = memoryReporter();

    emitRecords(rasterize("88", quiet), 2024, store, reporter);

    expect(progress).toEqual(["Progress: 10/20 commits", "Progress: 20/20 commits"]);
  });
});

describe("writeTextToHistory", () => {
  it("announces and emits", () => {
    const { store, timestamps } = fakeStore();
    const { reporter, logs } = memoryReporter();

    const summary = writeTextToHistory("1", 2024, store, { ...quiet, reporter });

    expect(summary.succeeded).toBe(8);
    expect(timestamps[0]).toBe("2024-01-09T12:00:00");
    expect(logs[0]).toBe("Generating 8 commits for '1' in 2024...");
  });

  it("rejects a bad year before touching the store", () => {
    const { store } = fakeStore();
    const { reporter } = memoryReporter();

    expect(() => writeTextToHistory("1", 1999, store, { ...quiet, reporter })).toThrow(
      InvalidYearError,
    );
    expect(store.isReady).not.toHaveBeenCalled();
    expect(store.recordAt).not.toHaveBeenCalled();
  });

  it("aborts when the store is not ready", () => {
    const { store } = fakeStore({ ready: false });
    const { reporter } = memoryReporter();

    expect(() => writeTextToHistory("1", 2024, store, { ...quiet, reporter })).toThrow(
      PreconditionMissingError,
    );
    expect(store.recordAt).not.toHaveBeenCalled();
  });

  it("aborts on empty results", () => {
    const { store } = fakeStore();
    const { reporter, logs } = memoryReporter();

    expect(() => writeTextToHistory("#", 2024, store, { ...quiet, reporter })).toThrow(
      EmptyResultError,
    );
    expect(store.recordAt).not.toHaveBeenCalled();
    expect(logs).toEqual([]);
  });

  it("uses the configured spacing", () => {
    const { store, timestamps } = fakeStore();
    const { reporter } = memoryReporter();

    writeTextToHistory("11", 2024, store, { ...quiet, reporter, spacing: 0 });

    // second '1' starts at column 3 instead of 4; its first lit cell is row 2
    expect(timestamps).toContain("2024-01-30T12:00:00");
  });
});
