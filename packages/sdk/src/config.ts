/**
 * Runtime configuration, read from the environment (and a `.env` file when the
 * entry point loads one).
 *
 *   OLLAMA_URL       model backend base URL        (http://localhost:11434)
 *   OLLAMA_MODEL     model name                    (llama3.2)
 *   LLM_TIMEOUT_MS   per-call model timeout        (120000)
 *   BOARDCHAT_DATA   JSON snapshot path            (.boardchat/state.json)
 *   LOG_LEVEL        debug | info | warn | error   (info)
 */

import { z } from "zod";
import { ValidationError } from "./errors";

const envSchema = z.object({
  OLLAMA_URL: z.string().url().default("http://localhost:11434"),
  OLLAMA_MODEL: z.string().min(1).default("llama3.2"),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  BOARDCHAT_DATA: z.string().min(1).default(".boardchat/state.json"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export interface BoardchatConfig {
  ollamaUrl: string;
  ollamaModel: string;
  llmTimeoutMs: number;
  dataPath: string;
  logLevel: "debug" | "info" | "warn" | "error";
}

function blankToUndefined(env: NodeJS.ProcessEnv): Record<string, string | undefined> {
  const out: Record<string, string | undefined> = {};
  for (const key of Object.keys(envSchema.shape)) {
    const value = env[key];
    out[key] = value === undefined || value.trim() === "" ? undefined : value.trim();
  }
  return out;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BoardchatConfig {
  const parsed = envSchema.safeParse(blankToUndefined(env));
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ValidationError(`Invalid configuration: ${detail}`);
  }
  const c = parsed.data;
  return {
    ollamaUrl: c.OLLAMA_URL.replace(/\/+$/, ""),
    ollamaModel: c.OLLAMA_MODEL,
    llmTimeoutMs: c.LLM_TIMEOUT_MS,
    dataPath: c.BOARDCHAT_DATA,
    logLevel: c.LOG_LEVEL,
  };
}
