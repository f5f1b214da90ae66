import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";
import { ValidationError } from "./errors";

describe("loadConfig", () => {
  it("falls back to defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual({
      ollamaUrl: "http://localhost:11434",
      ollamaModel: "llama3.2",
      llmTimeoutMs: 120_000,
      dataPath: ".boardchat/state.json",
      logLevel: "info",
    });
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ OLLAMA_MODEL: "   ", LOG_LEVEL: "" });
    expect(config.ollamaModel).toBe("llama3.2");
    expect(config.logLevel).toBe("info");
  });

  it("reads overrides and trims the url", () => {
    const config = loadConfig({
      OLLAMA_URL: "https://llm.internal.test/",
      LLM_TIMEOUT_MS: "45000",
      BOARDCHAT_DATA: "/var/lib/boardchat/state.json",
      LOG_LEVEL: "debug",
    });
    expect(config.ollamaUrl).toBe("https://llm.internal.test");
    expect(config.llmTimeoutMs).toBe(45_000);
    expect(config.dataPath).toBe("/var/lib/boardchat/state.json");
    expect(config.logLevel).toBe("debug");
  });

  it("rejects invalid values with the offending keys", () => {
    expect(() => loadConfig({ LOG_LEVEL: "loud" })).toThrow(ValidationError);
    expect(() => loadConfig({ LLM_TIMEOUT_MS: "-5" })).toThrow(/^Invalid configuration: LLM_TIMEOUT_MS: /);
    expect(() => loadConfig({ OLLAMA_URL: "not a url" })).toThrow(/OLLAMA_URL/);
  });
});
