import path from "node:path";
import type { ActionInput } from "../store.ts";
import { readJsonFile, writeJsonFileAtomic } from "../store/jsonFiles.ts";
import { isPlainRecord } from "../utils.ts";
import { TimerError, type TimerWarning } from "./timerErrors.ts";
import {
  TimerEntryFileSchema,
  TimerEntryNameSchema,
  formatZodIssues,
  toTimerEntry,
  toTimerEntryFile
} from "./timerSchema.ts";
import { TimerTable } from "./timerTable.ts";
import { GAME_MODES, isGameMode, type GameMode, type TimerEntry } from "./timerTypes.ts";

export const FALLBACK_MODE: GameMode = "ranked";

export type ModeLoadResult = {
  table: TimerTable;
  warnings: TimerWarning[];
};

export type TableLookup = {
  table: TimerTable;
  warnings: TimerWarning[];
};

type ActionSink = { logAction(action: ActionInput): unknown };

export type TimerConfigStoreOptions = {
  configDir: string;
  store?: ActionSink | null;
};

/**
 * Validates a mode file entry by entry. A bad entry is skipped with a
 * warning; the rest of the file still loads.
 */
export function parseModeDocument(mode: GameMode, document: unknown, loadedAt?: string): ModeLoadResult {
  if (!isPlainRecord(document)) {
    return {
      table: TimerTable.empty(mode),
      warnings: [
        {
          code: "malformed_timer_file",
          message: `Timer file for ${mode} must be a JSON object of named entries.`,
          mode
        }
      ]
    };
  }

  const entries: TimerEntry[] = [];
  const warnings: TimerWarning[] = [];
  for (const [name, raw] of Object.entries(document)) {
    const nameResult = TimerEntryNameSchema.safeParse(name);
    const entryResult = TimerEntryFileSchema.safeParse(raw);
    if (!nameResult.success || !entryResult.success) {
      const details = [
        ...(nameResult.success ? [] : formatZodIssues(nameResult.error.issues).map((line) => `name ${line}`)),
        ...(entryResult.success ? [] : formatZodIssues(entryResult.error.issues))
      ];
      warnings.push({
        code: "malformed_timer_entry",
        message: `Skipped timer "${name}" in ${mode}.`,
        mode,
        entryName: name,
        details
      });
      continue;
    }
    entries.push(toTimerEntry(name, entryResult.data));
  }

  return { table: new TimerTable(mode, entries, loadedAt), warnings };
}

export class TimerConfigStore {
  readonly configDir: string;
  private readonly store: ActionSink | null;
  private readonly tables = new Map<GameMode, TimerTable>();
  // raw documents, so rewrites keep entries this process could not parse
  private readonly documents = new Map<GameMode, Record<string, unknown>>();
  private writeChain: Promise<unknown> = Promise.resolve();

  constructor({ configDir, store = null }: TimerConfigStoreOptions) {
    this.configDir = configDir;
    this.store = store;
  }

  filePathFor(mode: GameMode) {
    return path.join(this.configDir, `${mode}.json`);
  }

  async loadAll(): Promise<TimerWarning[]> {
    const warnings: TimerWarning[] = [];
    for (const mode of GAME_MODES) {
      const result = await this.loadMode(mode);
      warnings.push(...result.warnings);
    }
    return warnings;
  }

  /** Reads one mode file; a missing file leaves the mode unloaded. */
  async loadMode(mode: GameMode): Promise<ModeLoadResult> {
    const read = await readJsonFile(this.filePathFor(mode));
    if (read.status === "missing") {
      this.tables.delete(mode);
      this.documents.delete(mode);
      return { table: TimerTable.empty(mode), warnings: [] };
    }
    if (read.status === "invalid") {
      const warning: TimerWarning = {
        code: "malformed_timer_file",
        message: `Timer file for ${mode} is not valid JSON; keeping the previous table.`,
        mode,
        details: [read.error]
      };
      this.logWarnings([warning]);
      return { table: this.tables.get(mode) ?? TimerTable.empty(mode), warnings: [warning] };
    }

    const result = parseModeDocument(mode, read.value);
    if (isPlainRecord(read.value)) {
      this.tables.set(mode, result.table);
      this.documents.set(mode, { ...read.value });
    }
    this.logWarnings(result.warnings);
    this.store?.logAction({
      kind: "config_runtime",
      content: "timer_table_loaded",
      metadata: { mode, entries: result.table.size, warnings: result.warnings.length }
    });
    return result;
  }

  reloadMode(mode: GameMode) {
    return this.loadMode(mode);
  }

  hasTable(mode: GameMode) {
    return this.tables.has(mode);
  }

  /**
   * Resolves the table for a requested mode. Unknown modes and modes with no
   * loaded table fall back to the ranked table with an `unknown_mode` warning;
   * callers log the warnings against their own context.
   */
  getTable(requestedMode: string): TableLookup {
    const known = isGameMode(requestedMode);
    const requested = known ? this.tables.get(requestedMode) : undefined;
    if (requested) return { table: requested, warnings: [] };

    const fallback = this.tables.get(FALLBACK_MODE);
    const reason = known ? `No timers are loaded for ${requestedMode}` : `Unknown game mode "${requestedMode}"`;
    const message = fallback
      ? `${reason}; using ${FALLBACK_MODE} timers.`
      : `${reason} and no ${FALLBACK_MODE} timers are loaded either; no timers will fire.`;
    return {
      table: fallback ?? TimerTable.empty(FALLBACK_MODE),
      warnings: [{ code: "unknown_mode", message, mode: requestedMode }]
    };
  }

  listTimers(mode: GameMode): readonly TimerEntry[] {
    return this.tables.get(mode)?.list() ?? [];
  }

  upsertTimer(mode: GameMode, name: string, raw: unknown): Promise<TimerTable> {
    const nameResult = TimerEntryNameSchema.safeParse(name);
    const entryResult = TimerEntryFileSchema.safeParse(raw);
    if (!nameResult.success || !entryResult.success) {
      const details = [
        ...(nameResult.success ? [] : formatZodIssues(nameResult.error.issues).map((line) => `name ${line}`)),
        ...(entryResult.success ? [] : formatZodIssues(entryResult.error.issues))
      ];
      return Promise.reject(new TimerError("invalid_timer_entry", `Timer "${name}" is not valid.`, details));
    }
    const serialized = toTimerEntryFile(toTimerEntry(name, entryResult.data));
    return this.mutate(mode, (document) => {
      document[name] = serialized;
    });
  }

  removeTimer(mode: GameMode, name: string): Promise<TimerTable> {
    return this.mutate(mode, (document) => {
      if (!Object.hasOwn(document, name)) {
        throw new TimerError("unknown_timer", `No timer named "${name}" in ${mode}.`);
      }
      delete document[name];
    });
  }

  // Single writer: mutations run one at a time and each ends with an atomic file swap.
  private mutate(mode: GameMode, apply: (document: Record<string, unknown>) => void): Promise<TimerTable> {
    const run = this.writeChain.then(async () => {
      const document = { ...(this.documents.get(mode) ?? {}) };
      apply(document);
      await writeJsonFileAtomic(this.filePathFor(mode), document);
      const result = parseModeDocument(mode, document);
      this.documents.set(mode, document);
      this.tables.set(mode, result.table);
      this.store?.logAction({
        kind: "config_runtime",
        content: "timer_table_updated",
        metadata: { mode, entries: result.table.size }
      });
      return result.table;
    });
    this.writeChain = run.catch(() => undefined);
    return run;
  }

  private logWarnings(warnings: readonly TimerWarning[]) {
    for (const warning of warnings) {
      this.store?.logAction({
        kind: "timer_warning",
        content: warning.code,
        metadata: {
          mode: warning.mode,
          entryName: warning.entryName ?? null,
          message: warning.message,
          details: warning.details ?? []
        }
      });
    }
  }
}
