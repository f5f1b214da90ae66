import http from "node:http";
import https from "node:https";
import { z } from "zod";
import { InfrastructureError, errorMessage } from "./errors";
import { createLogger } from "./logger";
import type { BoardchatConfig } from "./config";

const log = createLogger("llm");

export interface ChatTurn {
  role: "system" | "user" | "assistant";
  content: string;
}

/** Text in, text out. Implementations raise `InfrastructureError` on any backend failure. */
export interface LanguageModel {
  readonly model: string;
  chat(messages: ChatTurn[]): Promise<string>;
}

export interface HttpResponse {
  statusCode: number;
  body: string;
}

export type HttpRequest = (args: {
  method: "GET" | "POST";
  url: URL;
  body?: unknown;
  timeoutMs: number;
}) => Promise<HttpResponse>;

export const requestJson: HttpRequest = (args) =>
  new Promise((resolve, reject) => {
    const payload = args.body === undefined ? undefined : JSON.stringify(args.body);
    const transport = args.url.protocol === "https:" ? https : http;
    const headers: Record<string, string> = { accept: "application/json" };
    if (payload !== undefined) {
      headers["content-type"] = "application/json";
      headers["content-length"] = Buffer.byteLength(payload).toString();
    }
    const req = transport.request(
      {
        protocol: args.url.protocol,
        hostname: args.url.hostname,
        port: args.url.port ? Number(args.url.port) : undefined,
        path: `${args.url.pathname}${args.url.search}`,
        method: args.method,
        headers,
      },
      (res) => {
        const chunks: Buffer[] = [];
        res.on("data", (c) => chunks.push(Buffer.isBuffer(c) ? c : Buffer.from(c)));
        res.on("error", reject);
        res.on("end", () => {
          resolve({
            statusCode: res.statusCode ?? 0,
            body: Buffer.concat(chunks).toString("utf8"),
          });
        });
      },
    );

    req.on("error", reject);
    req.setTimeout(args.timeoutMs, () => {
      req.destroy(new Error(`Request timeout after ${args.timeoutMs}ms`));
    });
    if (payload !== undefined) req.write(payload);
    req.end();
  });

const chatResponseSchema = z.object({
  message: z.object({
    role: z.string().optional(),
    content: z.string(),
  }),
});

export interface OllamaClientOptions {
  baseUrl: string;
  model: string;
  timeoutMs: number;
  request?: HttpRequest;
}

/** Non-streaming client for an Ollama server's `/api/chat`. */
export class OllamaClient implements LanguageModel {
  readonly model: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly request: HttpRequest;

  constructor(options: OllamaClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.model = options.model;
    this.timeoutMs = options.timeoutMs;
    this.request = options.request ?? requestJson;
  }

  static fromConfig(config: BoardchatConfig, request?: HttpRequest): OllamaClient {
    return new OllamaClient({
      baseUrl: config.ollamaUrl,
      model: config.ollamaModel,
      timeoutMs: config.llmTimeoutMs,
      request,
    });
  }

  async chat(messages: ChatTurn[]): Promise<string> {
    const url = new URL(`${this.baseUrl}/api/chat`);
    let res: HttpResponse;
    try {
      res = await this.request({
        method: "POST",
        url,
        body: { model: this.model, messages, stream: false },
        timeoutMs: this.timeoutMs,
      });
    } catch (err) {
      throw new InfrastructureError(`Model request failed: ${errorMessage(err)}`, err);
    }

    if (res.statusCode < 200 || res.statusCode >= 300) {
      throw new InfrastructureError(`Model backend returned error ${res.statusCode}: ${res.body}`);
    }

    let json: unknown;
    try {
      json = JSON.parse(res.body);
    } catch (err) {
      throw new InfrastructureError(`Failed to parse model response: ${errorMessage(err)}`, err);
    }
    const parsed = chatResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new InfrastructureError("Failed to parse model response: missing message.content");
    }
    log.debug("model replied", { model: this.model, chars: parsed.data.message.content.length });
    return parsed.data.message.content;
  }

  /** `true` when the server answers its model listing. */
  async isAvailable(): Promise<boolean> {
    try {
      const res = await this.request({
        method: "GET",
        url: new URL(`${this.baseUrl}/api/tags`),
        timeoutMs: Math.min(this.timeoutMs, 5_000),
      });
      return res.statusCode >= 200 && res.statusCode < 300;
    } catch (err) {
      log.debug("model backend unreachable", { url: this.baseUrl, error: errorMessage(err) });
      return false;
    }
  }
}
