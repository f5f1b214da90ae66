import { z } from "zod";

/** One action as the model wrote it, before names and parameters are interpreted. */
export interface ActionDescriptor {
  action: string;
  params: Record<string, unknown>;
  message?: string;
}

export const PROCESSING_MESSAGE = "Processing your request...";

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

const descriptorSchema = z.object({
  action: z.string(),
  params: z.unknown().transform((v): Record<string, unknown> => (isRecord(v) ? v : {})),
  message: z
    .string()
    .nullish()
    .transform((v) => v ?? undefined),
});

const envelopeSchema = z.object({
  actions: z.array(z.unknown()),
  message: z
    .string()
    .nullish()
    .transform((v) => v ?? undefined),
});

function toDescriptor(value: unknown): ActionDescriptor | undefined {
  const parsed = descriptorSchema.safeParse(value);
  if (!parsed.success) return undefined;
  const { action, params, message } = parsed.data;
  return message === undefined ? { action, params } : { action, params, message };
}

/**
 * Reads one JSON value as a descriptor, a list of descriptors, or an
 * `{ "actions": [...] }` envelope. `undefined` when it is none of these.
 */
function descriptorsFromValue(value: unknown): ActionDescriptor[] | undefined {
  const single = toDescriptor(value);
  if (single) return [single];

  let items: unknown[];
  let sharedMessage: string | undefined;
  const envelope = envelopeSchema.safeParse(value);
  if (envelope.success) {
    items = envelope.data.actions;
    sharedMessage = envelope.data.message;
  } else if (Array.isArray(value)) {
    items = value;
  } else {
    return undefined;
  }

  const out: ActionDescriptor[] = [];
  for (const item of items) {
    const d = toDescriptor(item);
    if (!d) continue;
    if (d.message === undefined && sharedMessage !== undefined) d.message = sharedMessage;
    out.push(d);
  }
  return out.length > 0 ? out : undefined;
}

function tryJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

const FENCE_RE = /```[A-Za-z0-9_+-]+[ \t]*\r?\n([\s\S]*?)```/;

/** Index of the brace closing the one at `start`, or -1. Braces inside strings do not count. */
function closingBrace(text: string, start: number): number {
  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === "{") depth++;
    else if (ch === "}") {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function scanObjects(text: string): ActionDescriptor[] {
  const out: ActionDescriptor[] = [];
  let i = 0;
  while (i < text.length) {
    if (text[i] !== "{") {
      i++;
      continue;
    }
    const end = closingBrace(text, i);
    if (end === -1) {
      i++;
      continue;
    }
    const found = descriptorsFromValue(tryJson(text.slice(i, end + 1)));
    if (found) out.push(...found);
    i = end + 1;
  }
  return out;
}

/**
 * Pulls every action out of a model reply. Tries, in order: the whole reply as
 * JSON, the first fenced code block, then each brace-balanced span in the text.
 * Never throws; prose without actions yields an empty list.
 */
export function parseActions(raw: string): ActionDescriptor[] {
  const trimmed = raw.trim();

  const whole = descriptorsFromValue(tryJson(trimmed));
  if (whole) return whole;

  const fence = FENCE_RE.exec(trimmed);
  if (fence?.[1] !== undefined) {
    const fenced = descriptorsFromValue(tryJson(fence[1].trim()));
    if (fenced) return fenced;
  }

  return scanObjects(trimmed);
}

/** The text to show the user for a reply that may be mostly JSON. */
export function extractReadableMessage(raw: string, descriptors: ActionDescriptor[]): string {
  const messages = descriptors
    .map((d) => d.message?.trim() ?? "")
    .filter((m) => m.length > 0);
  if (messages.length > 0) return messages.join(" ");

  const trimmed = raw.trim();
  if (trimmed.startsWith("{") || trimmed.includes('"action"')) return PROCESSING_MESSAGE;
  return trimmed;
}
