export type VoiceChannelCandidate = {
  id: string;
  name: string;
  humanCount: number;
  joinable: boolean;
};

export type VoiceChannelPick = {
  channelId: string;
  reason: "explicit" | "requester" | "most_members";
};

export type PickVoiceChannelInput = {
  explicitChannelId?: string | null;
  requesterChannelId?: string | null;
  channels: readonly VoiceChannelCandidate[];
};

/**
 * Explicit channel first, then the requester's channel, then the busiest
 * joinable channel. Empty channels are never picked by the fallback.
 */
export function pickVoiceChannel({ explicitChannelId, requesterChannelId, channels }: PickVoiceChannelInput): VoiceChannelPick | null {
  const joinable = channels.filter((channel) => channel.joinable);
  const byId = new Map(joinable.map((channel) => [channel.id, channel]));

  if (explicitChannelId) {
    return byId.has(explicitChannelId) ? { channelId: explicitChannelId, reason: "explicit" } : null;
  }
  if (requesterChannelId && byId.has(requesterChannelId)) {
    return { channelId: requesterChannelId, reason: "requester" };
  }

  let best: VoiceChannelCandidate | null = null;
  for (const channel of joinable) {
    if (channel.humanCount <= 0) continue;
    if (!best || channel.humanCount > best.humanCount) best = channel;
  }
  return best ? { channelId: best.id, reason: "most_members" } : null;
}
