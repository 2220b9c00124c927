/**
 * Event catalogue shared by the scheduler, the stream controller and the observer gateway.
 * Wire format: { "event": <kind>, "data": <payload> }.
 */

import type { LivePlatformKind } from "../config";
import type { StreamStatus } from "../egress/types";

export interface AgentView {
  id: string;
  name: string;
  expertise: string;
  avatar: string;
  color: string;
  is_speaking: boolean;
}

export interface DiscussionStats {
  message_count: number;
  round: number;
  current_topic: string;
  is_active: boolean;
  active_agent: string | null;
  agents_count: number;
  egress_live: boolean;
}

export interface Snapshot {
  topic: string;
  agents: AgentView[];
  stats: DiscussionStats;
  stream_status: StreamStatus;
  server_time: string;
}

export interface SpeakerRef {
  agent_id: string;
  agent_name: string;
  avatar: string;
  color: string;
}

export interface DiscussionEvents {
  topic_update: { topic: string; round: number };
  agent_start_speaking: SpeakerRef & { round: number };
  new_message: SpeakerRef & {
    expertise: string;
    message: string;
    timestamp: string;
    message_count: number;
    round: number;
  };
  agent_stop_speaking: { agent_id: string; round: number };
  round_complete: { round: number; total_messages: number; next_round_in_seconds: number };
  discussion_error: { round: number; agent_id: string; message: string };
  discussion_stopped: { round: number; total_messages: number };
  discussion_started: { topic: string; round: number };
  stream_started: { target: string; platform: LivePlatformKind; title: string | null };
  stream_connected: { target: string };
  stream_warning: { message: string };
  stream_stopped: { reason: string; exit_code: number | null };
  connected: Snapshot;
  update: Snapshot;
}

export type EventKind = keyof DiscussionEvents;

export interface EventEnvelope {
  event: EventKind;
  data: DiscussionEvents[EventKind];
}

/** Where producers publish; the broadcaster is the production implementation. */
export interface EventSink {
  publish<K extends EventKind>(kind: K, payload: DiscussionEvents[K]): void;
}
