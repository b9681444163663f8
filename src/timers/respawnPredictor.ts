import { upperBound, type DueWindow } from "./timerTable.ts";
import { compareEntries, type PredictedEntrySource, type TimerEntry } from "./timerTypes.ts";

export type RespawnPrediction = {
  objective: string;
  killTime: number;
  respawnAt: number;
  respawnFired: boolean;
  pending: TimerEntry[];
};

export type KillRecordResult = {
  prediction: RespawnPrediction;
  superseded: RespawnPrediction | null;
  // true when the replaced prediction had not reached its respawn yet
  supersededBeforeRespawn: boolean;
};

export type ObjectiveStatus = {
  objective: string;
  label: string;
  nextSpawnAt: number;
  source: "authored" | "predicted";
  lastKillAt: number | null;
};

function predictedMessages(base: TimerEntry, source: PredictedEntrySource): string[] {
  const label = base.label;
  switch (source) {
    case "pre_window":
      return [`${label} respawn window is opening`, `${label} could be back any moment`];
    case "respawn":
      return base.respawnMessages.length
        ? [...base.respawnMessages]
        : [`${label} should be respawning now`, `${label} is expected back up`];
    case "post_window":
      return [`${label} respawn window has closed`, `${label} should be up by now`];
    case "buff_expiry":
      return [`${label} buff has expired`, `${label} buff is gone, play around it`];
  }
}

function predictedEntry(base: TimerEntry, source: PredictedEntrySource, offset: number): TimerEntry {
  return {
    name: `${base.name}:${source}`,
    label: base.label,
    offset,
    messages: predictedMessages(base, source),
    category: source === "buff_expiry" ? "buff" : base.category,
    respawnTime: null,
    respawnWindow: 0,
    buffDuration: null,
    respawnMessages: [],
    source,
    objective: base.name
  };
}

export function buildPredictedEntries(base: TimerEntry, killTime: number): TimerEntry[] {
  if (base.respawnTime === null) return [];
  const respawnAt = killTime + base.respawnTime;
  const entries = [predictedEntry(base, "respawn", respawnAt)];
  if (base.respawnWindow > 0) {
    entries.push(predictedEntry(base, "pre_window", respawnAt - base.respawnWindow));
    entries.push(predictedEntry(base, "post_window", respawnAt + base.respawnWindow));
  }
  if (base.buffDuration !== null) {
    entries.push(predictedEntry(base, "buff_expiry", killTime + base.buffDuration));
  }
  return entries.sort(compareEntries);
}

/**
 * Per-session respawn bookkeeping. Owns the predicted entries generated from
 * recorded kills; at most one live prediction per objective.
 */
export class RespawnPredictor {
  private readonly predictions = new Map<string, RespawnPrediction>();
  private readonly lastKills = new Map<string, { killTime: number; respawnAt: number }>();

  recordKill(base: TimerEntry, killTime: number, currentElapsed: number): KillRecordResult {
    if (base.respawnTime === null) {
      throw new Error(`${base.name} has no respawn time`);
    }

    const superseded = this.predictions.get(base.name) ?? null;
    const respawnAt = killTime + base.respawnTime;
    const prediction: RespawnPrediction = {
      objective: base.name,
      killTime,
      respawnAt,
      respawnFired: respawnAt <= currentElapsed,
      pending: buildPredictedEntries(base, killTime).filter((entry) => entry.offset > currentElapsed)
    };

    if (prediction.pending.length) {
      this.predictions.set(base.name, prediction);
    } else {
      this.predictions.delete(base.name);
    }
    this.lastKills.set(base.name, { killTime, respawnAt });

    return {
      prediction,
      superseded,
      supersededBeforeRespawn: Boolean(superseded && !superseded.respawnFired)
    };
  }

  /** Consumes and returns predicted entries in (previousElapsed, elapsed]. */
  dueEntries({ previousElapsed, elapsed }: DueWindow): TimerEntry[] {
    if (!(elapsed > previousElapsed)) return [];

    const due: TimerEntry[] = [];
    for (const [objective, prediction] of this.predictions) {
      const from = upperBound(prediction.pending, previousElapsed);
      const to = upperBound(prediction.pending, elapsed);
      if (from === to) continue;

      const fired = prediction.pending.splice(from, to - from);
      due.push(...fired);
      if (fired.some((entry) => entry.source === "respawn")) {
        prediction.respawnFired = true;
      }
      if (!prediction.pending.length) {
        this.predictions.delete(objective);
      }
    }
    return due.sort(compareEntries);
  }

  objectiveStatus(base: TimerEntry): ObjectiveStatus {
    const lastKill = this.lastKills.get(base.name);
    if (!lastKill) {
      return {
        objective: base.name,
        label: base.label,
        nextSpawnAt: base.offset,
        source: "authored",
        lastKillAt: null
      };
    }
    return {
      objective: base.name,
      label: base.label,
      nextSpawnAt: lastKill.respawnAt,
      source: "predicted",
      lastKillAt: lastKill.killTime
    };
  }

  pendingEntries(): TimerEntry[] {
    const pending: TimerEntry[] = [];
    for (const prediction of this.predictions.values()) {
      pending.push(...prediction.pending);
    }
    return pending.sort(compareEntries);
  }

  clear() {
    this.predictions.clear();
    this.lastKills.clear();
  }
}
