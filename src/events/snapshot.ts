/**
 * Builds the observer snapshot from the pieces that own each part of it.
 */

import type { PersonaRegistry } from "../personas/registry";
import type { DiscussionStateView } from "../scheduler/types";
import type { StreamStatus } from "../egress/types";
import type { Snapshot } from "./types";

export interface SnapshotParts {
  registry: PersonaRegistry;
  state: DiscussionStateView;
  /** Discussion loop enabled. */
  loopEnabled: boolean;
  stream: StreamStatus;
  now?: Date;
}

export function buildSnapshot(parts: SnapshotParts): Snapshot {
  const { registry, state, stream } = parts;
  return {
    topic: state.topic,
    agents: registry.list().map((p) => ({
      id: p.id,
      name: p.name,
      expertise: p.expertise,
      avatar: p.avatar,
      color: p.color,
      is_speaking: p.id === state.activeAgentId,
    })),
    stats: {
      message_count: state.messageCount,
      round: state.round,
      current_topic: state.topic,
      is_active: parts.loopEnabled || state.running,
      active_agent: state.activeAgentId,
      agents_count: registry.size,
      egress_live: stream.is_streaming,
    },
    stream_status: stream,
    server_time: (parts.now ?? new Date()).toISOString(),
  };
}
