import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { silentLogger } from "../util/logger";
import {
  FileStorage,
  LEGACY_BEST_SCORE_KEY,
  LEGACY_BEST_STREAK_KEY,
  MemoryStorage,
  RECORDS_STORAGE_KEY,
  StoragePersistenceGateway,
  migrateLegacyRecords
} from "./records";

const FIXED_NOW = () => new Date("2026-02-10T12:00:00.000Z");

describe("records", () => {
  const storage = new MemoryStorage();

  beforeEach(() => {
    storage.clear();
  });

  it("stores records in a versioned envelope", () => {
    const gateway = new StoragePersistenceGateway(storage, silentLogger, FIXED_NOW);
    gateway.save({ bestScore: 17, bestStreak: 17 });

    expect(JSON.parse(storage.getItem(RECORDS_STORAGE_KEY) ?? "")).toEqual({
      version: 1,
      data: { bestScore: 17, bestStreak: 17 },
      updatedAtIso: "2026-02-10T12:00:00.000Z"
    });
    expect(gateway.load()).toEqual({ bestScore: 17, bestStreak: 17 });
  });

  it("starts from zero when nothing is stored", () => {
    expect(new StoragePersistenceGateway(storage, silentLogger).load()).toEqual({ bestScore: 0, bestStreak: 0 });
  });

  it("floors fractional and negative values on save", () => {
    const gateway = new StoragePersistenceGateway(storage, silentLogger, FIXED_NOW);
    gateway.save({ bestScore: 4.7, bestStreak: -3 });
    expect(gateway.load()).toEqual({ bestScore: 4, bestStreak: 0 });
  });

  it("treats corrupted JSON as empty records", () => {
    const logger = { debug: vi.fn(), warn: vi.fn() };
    storage.setItem(RECORDS_STORAGE_KEY, "{not json");
    expect(new StoragePersistenceGateway(storage, logger).load()).toEqual({ bestScore: 0, bestStreak: 0 });
    expect(logger.warn).toHaveBeenCalledWith("Failed to load records", expect.any(SyntaxError));
  });

  it("discards an envelope with an unknown version", () => {
    const logger = { debug: vi.fn(), warn: vi.fn() };
    storage.setItem(RECORDS_STORAGE_KEY, JSON.stringify({ version: 2, data: { bestScore: 9, bestStreak: 9 } }));
    expect(new StoragePersistenceGateway(storage, logger).load()).toEqual({ bestScore: 0, bestStreak: 0 });
    expect(logger.warn).toHaveBeenCalledWith("Discarding unreadable records envelope");
  });

  it("migrates the legacy counters and removes them", () => {
    storage.setItem(LEGACY_BEST_SCORE_KEY, "23");
    storage.setItem(LEGACY_BEST_STREAK_KEY, "19");
    const gateway = new StoragePersistenceGateway(storage, silentLogger, FIXED_NOW);

    expect(gateway.load()).toEqual({ bestScore: 23, bestStreak: 19 });
    expect(storage.getItem(LEGACY_BEST_SCORE_KEY)).toBeNull();
    expect(storage.getItem(LEGACY_BEST_STREAK_KEY)).toBeNull();
    expect(gateway.load()).toEqual({ bestScore: 23, bestStreak: 19 });
  });

  it("reads a partial or unparsable legacy counter as zero", () => {
    storage.setItem(LEGACY_BEST_SCORE_KEY, "lots");
    expect(migrateLegacyRecords(storage)).toEqual({ bestScore: 0, bestStreak: 0 });

    storage.setItem(LEGACY_BEST_SCORE_KEY, "8");
    expect(migrateLegacyRecords(storage)).toEqual({ bestScore: 8, bestStreak: 0 });
  });

  it("returns null when no legacy counters exist", () => {
    expect(migrateLegacyRecords(storage)).toBeNull();
  });
});

describe("FileStorage", () => {
  let dir = "";

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "gapflight-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("persists records across gateway instances", () => {
    const filePath = join(dir, "records.json");
    new StoragePersistenceGateway(new FileStorage(filePath), silentLogger, FIXED_NOW).save({
      bestScore: 31,
      bestStreak: 31
    });

    const reloaded = new StoragePersistenceGateway(new FileStorage(filePath), silentLogger);
    expect(reloaded.load()).toEqual({ bestScore: 31, bestStreak: 31 });
    expect(Object.keys(JSON.parse(readFileSync(filePath, "utf8")))).toEqual([RECORDS_STORAGE_KEY]);
  });

  it("reads a missing or malformed file as empty", () => {
    const filePath = join(dir, "records.json");
    const fileStorage = new FileStorage(filePath);
    expect(fileStorage.getItem(RECORDS_STORAGE_KEY)).toBeNull();

    writeFileSync(filePath, "[1, 2", "utf8");
    expect(fileStorage.getItem(RECORDS_STORAGE_KEY)).toBeNull();
  });

  it("removes keys", () => {
    const fileStorage = new FileStorage(join(dir, "records.json"));
    fileStorage.setItem("a", "1");
    fileStorage.setItem("b", "2");
    fileStorage.removeItem("a");
    expect(fileStorage.getItem("a")).toBeNull();
    expect(fileStorage.getItem("b")).toBe("2");
  });
});
