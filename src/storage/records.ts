import { readFileSync, writeFileSync } from "node:fs";
import { z } from "zod";
import type { PersistedRecords } from "../types";
import { defaultLogger, type Logger } from "../util/logger";

const RECORDS_VERSION = 1;
export const RECORDS_STORAGE_KEY = "gapflight:records";
export const LEGACY_BEST_SCORE_KEY = "lm_best_score";
export const LEGACY_BEST_STREAK_KEY = "lm_best_streak";

export interface PersistenceGateway {
  load(): PersistedRecords;
  save(records: PersistedRecords): void;
}

/** The subset of the Web Storage API the gateway needs; `localStorage` fits. */
export interface KeyValueStorage {
  getItem(key: string): string | null;
  setItem(key: string, value: string): void;
  removeItem(key: string): void;
}

export const EMPTY_RECORDS: PersistedRecords = { bestScore: 0, bestStreak: 0 };

const RecordsDataSchema = z.object({
  bestScore: z.number().int().nonnegative(),
  bestStreak: z.number().int().nonnegative()
});

const RecordsEnvelopeSchema = z.object({
  version: z.literal(RECORDS_VERSION),
  data: RecordsDataSchema,
  updatedAtIso: z.string().min(8).optional()
});

const LegacyCounterSchema = z.coerce.number().int().nonnegative();

export class MemoryStorage implements KeyValueStorage {
  private readonly entries = new Map<string, string>();

  getItem(key: string): string | null {
    return this.entries.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this.entries.set(key, value);
  }

  removeItem(key: string): void {
    this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }
}

const FileContentsSchema = z.record(z.string());

/** Key-value storage kept as one JSON object in a file. */
export class FileStorage implements KeyValueStorage {
  constructor(private readonly filePath: string) {}

  getItem(key: string): string | null {
    return this.read()[key] ?? null;
  }

  setItem(key: string, value: string): void {
    const contents = this.read();
    contents[key] = value;
    writeFileSync(this.filePath, JSON.stringify(contents, null, 2), "utf8");
  }

  removeItem(key: string): void {
    const contents = this.read();
    if (!(key in contents)) {
      return;
    }
    delete contents[key];
    writeFileSync(this.filePath, JSON.stringify(contents, null, 2), "utf8");
  }

  private read(): Record<string, string> {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(this.filePath, "utf8"));
    } catch {
      return {};
    }
    const result = FileContentsSchema.safeParse(parsed);
    return result.success ? result.data : {};
  }
}

/**
 * Reads the legacy flat counters written by earlier releases. Returns null when
 * neither key is present.
 */
export function migrateLegacyRecords(storage: KeyValueStorage): PersistedRecords | null {
  const rawScore = storage.getItem(LEGACY_BEST_SCORE_KEY);
  const rawStreak = storage.getItem(LEGACY_BEST_STREAK_KEY);
  if (rawScore === null && rawStreak === null) {
    return null;
  }
  const bestScore = LegacyCounterSchema.safeParse(rawScore ?? 0);
  const bestStreak = LegacyCounterSchema.safeParse(rawStreak ?? 0);
  return {
    bestScore: bestScore.success ? bestScore.data : 0,
    bestStreak: bestStreak.success ? bestStreak.data : 0
  };
}

export class StoragePersistenceGateway implements PersistenceGateway {
  constructor(
    private readonly storage: KeyValueStorage,
    private readonly logger: Logger = defaultLogger,
    private readonly now: () => Date = () => new Date()
  ) {}

  load(): PersistedRecords {
    try {
      const raw = this.storage.getItem(RECORDS_STORAGE_KEY);
      if (!raw) {
        return this.loadLegacy();
      }
      const result = RecordsEnvelopeSchema.safeParse(JSON.parse(raw));
      if (!result.success) {
        this.logger.warn("Discarding unreadable records envelope");
        return { ...EMPTY_RECORDS };
      }
      return { bestScore: result.data.data.bestScore, bestStreak: result.data.data.bestStreak };
    } catch (error) {
      this.logger.warn("Failed to load records", error);
      return { ...EMPTY_RECORDS };
    }
  }

  save(records: PersistedRecords): void {
    const data = RecordsDataSchema.parse({
      bestScore: Math.max(0, Math.floor(records.bestScore)),
      bestStreak: Math.max(0, Math.floor(records.bestStreak))
    });
    this.storage.setItem(
      RECORDS_STORAGE_KEY,
      JSON.stringify({
        version: RECORDS_VERSION,
        data,
        updatedAtIso: this.now().toISOString()
      })
    );
  }

  private loadLegacy(): PersistedRecords {
    const legacy = migrateLegacyRecords(this.storage);
    if (!legacy) {
      return { ...EMPTY_RECORDS };
    }
    this.save(legacy);
    this.storage.removeItem(LEGACY_BEST_SCORE_KEY);
    this.storage.removeItem(LEGACY_BEST_STREAK_KEY);
    return legacy;
  }
}
