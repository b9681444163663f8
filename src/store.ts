import { normalizeGuildSettings } from "./store/settingsNormalization.ts";
import { readJsonFile, writeJsonFileAtomic } from "./store/jsonFiles.ts";
import type { GuildSettings, GuildTtsSettings } from "./settings/settingsSchema.ts";
import { TIMER_CATEGORIES, type CategoryState, type TimerCategory } from "./timers/timerTypes.ts";
import { clamp, isPlainRecord, nowIso } from "./utils.ts";

const ACTION_RING_SIZE_DEFAULT = 500;
const ACTION_CONTENT_MAX_CHARS = 2000;
const SETTINGS_FILE_VERSION = 1;

export type ActionInput = {
  kind: string;
  guildId?: string | null;
  channelId?: string | null;
  userId?: string | null;
  content?: string | null;
  metadata?: Record<string, unknown> | null;
};

export type LoggedAction = {
  id: number;
  createdAt: string;
  kind: string;
  guildId: string | null;
  channelId: string | null;
  userId: string | null;
  content: string | null;
  metadata: Record<string, unknown> | null;
};

export type ActionListener = (action: LoggedAction) => void;

export type GuildSettingsPatch = {
  masterVolume?: number;
  categories?: Partial<Record<TimerCategory, Partial<CategoryState>>>;
  tts?: Partial<GuildTtsSettings>;
};

export type StoreOptions = {
  settingsPath: string;
  maxActions?: number;
};

export class Store {
  readonly settingsPath: string;
  onActionLogged: ActionListener | null = null;
  private readonly maxActions: number;
  private readonly guilds = new Map<string, GuildSettings>();
  private readonly actions: LoggedAction[] = [];
  private nextActionId = 1;
  private writeChain: Promise<void> = Promise.resolve();

  constructor({ settingsPath, maxActions = ACTION_RING_SIZE_DEFAULT }: StoreOptions) {
    this.settingsPath = settingsPath;
    this.maxActions = clamp(Math.floor(maxActions), 1, 100_000);
  }

  async init() {
    const read = await readJsonFile(this.settingsPath);
    if (read.status === "missing") return;
    if (read.status === "invalid") {
      this.logAction({
        kind: "config_warning",
        content: "guild_settings_unreadable",
        metadata: { path: this.settingsPath, error: read.error }
      });
      return;
    }

    const guilds = isPlainRecord(read.value) && isPlainRecord(read.value.guilds) ? read.value.guilds : {};
    this.guilds.clear();
    for (const [guildId, raw] of Object.entries(guilds)) {
      this.guilds.set(guildId, normalizeGuildSettings(raw));
    }
  }

  getGuildSettings(guildId: string): GuildSettings {
    return normalizeGuildSettings(this.guilds.get(guildId) ?? null);
  }

  listGuildIds() {
    return [...this.guilds.keys()].sort();
  }

  async patchGuildSettings(guildId: string, patch: GuildSettingsPatch): Promise<GuildSettings> {
    const current = this.getGuildSettings(guildId);
    const categories = { ...current.categories };
    for (const category of TIMER_CATEGORIES) {
      const categoryPatch = patch.categories?.[category];
      if (categoryPatch) {
        categories[category] = {
          muted: categoryPatch.muted ?? categories[category].muted,
          volume: categoryPatch.volume ?? categories[category].volume
        };
      }
    }
    const next = normalizeGuildSettings({
      masterVolume: patch.masterVolume ?? current.masterVolume,
      categories,
      tts: {
        voice: patch.tts?.voice ?? current.tts.voice,
        speed: patch.tts?.speed ?? current.tts.speed,
        numberToWords: patch.tts?.numberToWords ?? current.tts.numberToWords,
        pronunciations: patch.tts?.pronunciations ?? current.tts.pronunciations
      }
    });
    this.guilds.set(guildId, next);
    await this.persist();
    return normalizeGuildSettings(next);
  }

  // Writes are chained so the last patch always lands last on disk.
  private persist() {
    const snapshot = {
      version: SETTINGS_FILE_VERSION,
      updatedAt: nowIso(),
      guilds: Object.fromEntries(this.guilds)
    };
    const write = this.writeChain.then(() => writeJsonFileAtomic(this.settingsPath, snapshot));
    this.writeChain = write.catch(() => undefined);
    return write;
  }

  logAction(action: ActionInput) {
    const loggedAction: LoggedAction = {
      id: this.nextActionId,
      createdAt: nowIso(),
      kind: String(action.kind),
      guildId: action.guildId ? String(action.guildId) : null,
      channelId: action.channelId ? String(action.channelId) : null,
      userId: action.userId ? String(action.userId) : null,
      content: action.content ? String(action.content).slice(0, ACTION_CONTENT_MAX_CHARS) : null,
      metadata: action.metadata ?? null
    };
    this.nextActionId += 1;
    this.actions.push(loggedAction);
    if (this.actions.length > this.maxActions) {
      this.actions.splice(0, this.actions.length - this.maxActions);
    }

    if (this.onActionLogged) {
      const listener = this.onActionLogged;
      queueMicrotask(() => {
        try {
          listener(loggedAction);
        } catch (error) {
          process.emitWarning(`action listener failed: ${String(error)}`);
        }
      });
    }
    return loggedAction;
  }

  getRecentActions(limit = 200, kind?: string): LoggedAction[] {
    const boundedLimit = clamp(Math.floor(Number(limit) || 200), 1, this.maxActions);
    const filtered = kind ? this.actions.filter((action) => action.kind === kind) : this.actions;
    return filtered.slice(-boundedLimit).reverse();
  }

  countActions(kind: string) {
    return this.actions.filter((action) => action.kind === kind).length;
  }

  getStats() {
    const byKind: Record<string, number> = {};
    for (const action of this.actions) {
      byKind[action.kind] = (byKind[action.kind] ?? 0) + 1;
    }
    return {
      guildsConfigured: this.guilds.size,
      actionsBuffered: this.actions.length,
      errors: this.actions.filter((action) => action.kind.endsWith("_error")).length,
      byKind
    };
  }

  /** Resolves once every queued settings write has settled. */
  async flush() {
    await this.writeChain;
  }
}
