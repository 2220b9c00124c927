import * as path from "path";
import { PersonaRegistry, loadPersonaRegistry, parsePersona } from "../../../src/personas/registry";
import { TopicCatalog, loadTopicCatalog } from "../../../src/personas/topics";
import { persona } from "../../helpers/fixtures";

const DATA_DIR = path.resolve(__dirname, "../../../data");

describe("parsePersona", () => {
  it("rejects an entry with a missing field", () => {
    expect(() => parsePersona({ id: "x", name: "X" }, 2)).toThrow('Persona #2 is missing "expertise"');
  });

  it("rejects a non-object", () => {
    expect(() => parsePersona("volkov", 0)).toThrow("Persona #0 is not an object");
  });
});

describe("PersonaRegistry", () => {
  it("rejects an empty roster and duplicate ids", () => {
    expect(() => new PersonaRegistry([])).toThrow("Persona roster is empty");
    expect(() => new PersonaRegistry([persona("a"), persona("a")])).toThrow("Duplicate persona id: a");
  });

  it("looks personas up by id", () => {
    const registry = new PersonaRegistry([persona("a"), persona("b")]);
    expect(registry.list().map((p) => p.id)).toEqual(["a", "b"]);
    expect(registry.get("b")?.name).toBe("Dr. B");
    expect(registry.get("zzz")).toBeUndefined();
  });

  it("loads the bundled roster", () => {
    const registry = loadPersonaRegistry(path.join(DATA_DIR, "personas.json"));
    expect(registry.list().map((p) => p.id)).toEqual(["volkov", "sokolova", "petrov", "kovaleva"]);
    expect(registry.get("petrov")?.voice).toBe("male_en_deep");
  });
});

describe("TopicCatalog", () => {
  it("trims, dedupes and refuses an empty set", () => {
    const catalog = new TopicCatalog([" A ", "A", "B", ""]);
    expect(catalog.list()).toEqual(["A", "B"]);
    expect(() => new TopicCatalog(["  "])).toThrow("Topic catalog is empty");
  });

  it("picks uniformly over the index range", () => {
    const catalog = new TopicCatalog(["A", "B", "C"]);
    expect(catalog.pick(() => 0)).toBe("A");
    expect(catalog.pick(() => 0.5)).toBe("B");
    expect(catalog.pick(() => 0.9999)).toBe("C");
  });

  it("loads the bundled topics", () => {
    expect(loadTopicCatalog(path.join(DATA_DIR, "topics.json")).size).toBe(20);
  });
});
