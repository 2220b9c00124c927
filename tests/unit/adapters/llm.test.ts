/**
 * Unit tests for LLM adapters (stub and factory).
 */

import { AnthropicLLM, OpenAILLM, StubLLM, createLLM } from "../../../src/adapters/llm";
import { testConfig } from "../../helpers/fixtures";

describe("StubLLM", () => {
  it("is unavailable and returns empty text without fixed text", async () => {
    const llm = new StubLLM();
    expect(llm.available).toBe(false);
    const result = await llm.chat([{ role: "user", content: "Hello" }]);
    expect(result.text).toBe("");
  });

  it("returns fixed text when given", async () => {
    const llm = new StubLLM("stub response");
    expect(llm.available).toBe(true);
    await expect(llm.chat([])).resolves.toEqual({ text: "stub response" });
  });
});

describe("createLLM", () => {
  it("returns StubLLM when provider is stub", () => {
    expect(createLLM(testConfig())).toBeInstanceOf(StubLLM);
  });

  it("returns StubLLM when the provider has no key", () => {
    const config = testConfig();
    config.llm.provider = "openai";
    expect(createLLM(config)).toBeInstanceOf(StubLLM);
  });

  it("returns the configured provider when a key is set", () => {
    const config = testConfig();
    config.llm.provider = "openai";
    config.llm.openaiApiKey = "test-secret";
    expect(createLLM(config)).toBeInstanceOf(OpenAILLM);

    config.llm.provider = "anthropic";
    config.llm.anthropicApiKey = "test-secret";
    expect(createLLM(config)).toBeInstanceOf(AnthropicLLM);
  });
});
