/**
 * FeedOverlay: the text the outbound video shows. The feed's drawtext filters re-read these files
 * every frame, so updating a file is all it takes to change what viewers see.
 *
 * Layout: <dir>/topic.txt, <dir>/speaker.txt, <dir>/line.txt. Each write goes to a temp file and is
 * renamed into place so ffmpeg never reads a half-written file.
 */

import { randomUUID } from "crypto";
import * as fs from "fs/promises";
import * as path from "path";
import type { EventEnvelope } from "../events/types";
import { errMessage, logger } from "../logging";

const DEFAULT_LINE_WIDTH = 60;
const DEFAULT_MAX_LINES = 6;
/** Stands in for empty text. */
const BLANK = " ";

export interface OverlayFiles {
  topicFile: string;
  speakerFile: string;
  lineFile: string;
}

export interface FeedOverlayConfig {
  dir: string;
  /** Characters per wrapped line. */
  lineWidth?: number;
  maxLines?: number;
}

/** Greedy word wrap; words longer than a line are split, overflow ends in an ellipsis. */
export function wrapText(text: string, width: number, maxLines: number): string {
  const lines: string[] = [];
  let current = "";
  for (const word of text.split(/\s+/).filter(Boolean)) {
    let rest = word;
    while (rest.length > width) {
      if (current) lines.push(current);
      current = "";
      lines.push(rest.slice(0, width));
      rest = rest.slice(width);
    }
    if (!rest) continue;
    if (!current) current = rest;
    else if (current.length + 1 + rest.length <= width) current += ` ${rest}`;
    else {
      lines.push(current);
      current = rest;
    }
  }
  if (current) lines.push(current);
  if (lines.length <= maxLines) return lines.join("\n");
  const kept = lines.slice(0, maxLines);
  kept[maxLines - 1] += "…";
  return kept.join("\n");
}

export class FeedOverlay {
  readonly files: OverlayFiles;
  private readonly dir: string;
  private readonly lineWidth: number;
  private readonly maxLines: number;
  private writes: Promise<void> = Promise.resolve();

  constructor(config: FeedOverlayConfig) {
    this.dir = config.dir;
    this.lineWidth = config.lineWidth ?? DEFAULT_LINE_WIDTH;
    this.maxLines = config.maxLines ?? DEFAULT_MAX_LINES;
    this.files = {
      topicFile: path.resolve(this.dir, "topic.txt"),
      speakerFile: path.resolve(this.dir, "speaker.txt"),
      lineFile: path.resolve(this.dir, "line.txt"),
    };
  }

  /** Creates the directory and blank files; ffmpeg refuses to start on a missing textfile. */
  async init(topic = ""): Promise<void> {
    await fs.mkdir(this.dir, { recursive: true });
    await writeAtomic(this.files.topicFile, this.wrap(topic));
    await writeAtomic(this.files.speakerFile, BLANK);
    await writeAtomic(this.files.lineFile, BLANK);
  }

  /** Observer for the event broadcaster. */
  handle(envelope: EventEnvelope): void {
    const data = envelope.data;
    switch (envelope.event) {
      case "topic_update":
      case "discussion_started":
        if ("topic" in data) this.write(this.files.topicFile, this.wrap(data.topic));
        break;
      case "agent_start_speaking":
        if ("agent_name" in data) {
          this.write(this.files.speakerFile, data.agent_name);
          this.write(this.files.lineFile, "…");
        }
        break;
      case "new_message":
        if ("expertise" in data) {
          this.write(this.files.speakerFile, `${data.agent_name} (${data.expertise})`);
          this.write(this.files.lineFile, this.wrap(data.message));
        }
        break;
      case "agent_stop_speaking":
      case "discussion_stopped":
        this.write(this.files.speakerFile, BLANK);
        this.write(this.files.lineFile, BLANK);
        break;
      default:
        break;
    }
  }

  /** Resolves once every queued write has landed. */
  flush(): Promise<void> {
    return this.writes;
  }

  private wrap(text: string): string {
    return wrapText(text, this.lineWidth, this.maxLines) || BLANK;
  }

  private write(file: string, content: string): void {
    this.writes = this.writes
      .then(() => writeAtomic(file, content))
      .catch((err: unknown) => {
        logger.warn({ event: "OVERLAY_WRITE_FAILED", file, err: errMessage(err) }, "Overlay update failed");
      });
  }
}

async function writeAtomic(file: string, content: string): Promise<void> {
  const tmp = `${file}.${randomUUID()}.tmp`;
  await fs.writeFile(tmp, content, "utf-8");
  await fs.rename(tmp, file);
}
