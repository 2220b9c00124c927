/**
 * Persona Registry: static roster read from a JSON file (default data/personas.json).
 */

import * as fs from "fs";
import type { Persona } from "./types";

/** Validate one roster entry from the file. Throws with the offending index. */
export function parsePersona(raw: unknown, index: number): Persona {
  if (raw == null || typeof raw !== "object") {
    throw new Error(`Persona #${index} is not an object`);
  }
  const fields = new Map<string, unknown>(Object.entries(raw));
  const read = (key: keyof Persona): string => {
    const v = fields.get(key);
    if (typeof v !== "string" || v.trim().length === 0) {
      throw new Error(`Persona #${index} is missing "${key}"`);
    }
    return v.trim();
  };
  return {
    id: read("id"),
    name: read("name"),
    expertise: read("expertise"),
    personality: read("personality"),
    avatar: read("avatar"),
    color: read("color"),
    voice: read("voice"),
  };
}

export class PersonaRegistry {
  private readonly personas: readonly Persona[];
  private readonly byId: ReadonlyMap<string, Persona>;

  constructor(personas: Persona[]) {
    if (personas.length === 0) throw new Error("Persona roster is empty");
    const byId = new Map<string, Persona>();
    for (const p of personas) {
      if (byId.has(p.id)) throw new Error(`Duplicate persona id: ${p.id}`);
      byId.set(p.id, Object.freeze({ ...p }));
    }
    this.byId = byId;
    this.personas = Object.freeze(Array.from(byId.values()));
  }

  list(): readonly Persona[] {
    return this.personas;
  }

  get(id: string): Persona | undefined {
    return this.byId.get(id);
  }

  get size(): number {
    return this.personas.length;
  }
}

export function loadPersonaRegistry(filePath: string): PersonaRegistry {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  if (!Array.isArray(raw)) throw new Error(`Persona file ${filePath} must contain a JSON array`);
  return new PersonaRegistry(raw.map((entry, i) => parsePersona(entry, i)));
}
