/**
 * Topic Catalog: the static, non-empty topic set a discussion draws from.
 */

import * as fs from "fs";

export class TopicCatalog {
  private readonly topics: readonly string[];

  constructor(topics: string[]) {
    const cleaned = Array.from(new Set(topics.map((t) => t.trim()).filter((t) => t.length > 0)));
    if (cleaned.length === 0) throw new Error("Topic catalog is empty");
    this.topics = Object.freeze(cleaned);
  }

  /** Uniform pick; `random` returns a float in [0, 1). */
  pick(random: () => number = Math.random): string {
    const i = Math.min(this.topics.length - 1, Math.floor(random() * this.topics.length));
    return this.topics[i];
  }

  list(): readonly string[] {
    return this.topics;
  }

  get size(): number {
    return this.topics.length;
  }
}

export function loadTopicCatalog(filePath: string): TopicCatalog {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  if (!Array.isArray(raw)) throw new Error(`Topic file ${filePath} must contain a JSON array`);
  return new TopicCatalog(raw.filter((t): t is string => typeof t === "string"));
}
