import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import {
  DEFAULT_TAG_COLOR,
  createEmptyState,
  parseRole,
  parseStatus,
  storedVisibility,
  type State,
} from "./model";
import { InfrastructureError, ValidationError } from "./errors";
import { MemoryStore } from "./store";
import { repairPositions } from "./positions";
import { createLogger } from "./logger";

const log = createLogger("store");

const nullableString = z.string().nullable().default(null);

const roleSchema = z.string().transform((raw, ctx) => {
  const role = parseRole(raw);
  if (!role) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown board role: ${raw}` });
    return z.NEVER;
  }
  return role;
});

const statusSchema = z.string().transform((raw, ctx) => {
  const status = parseStatus(raw);
  if (!status) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Unknown card status: ${raw}` });
    return z.NEVER;
  }
  return status;
});

const boardSchema = z.object({
  id: z.string(),
  name: z.string(),
  description: nullableString,
  ownerId: z.string(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const columnSchema = z.object({
  id: z.string(),
  boardId: z.string(),
  name: z.string(),
  position: z.number().int(),
  createdAt: z.string(),
  updatedAt: z.string(),
});

const cardSchema = z.object({
  id: z.string(),
  columnId: nullableString,
  position: z.number().int().nullable(),
  title: z.string(),
  body: nullableString,
  visibility: z.unknown().transform(storedVisibility),
  status: statusSchema.default("open"),
  ownerId: nullableString,
  createdBy: z.string(),
  startDate: nullableString,
  endDate: nullableString,
  dueDate: nullableString,
  createdAt: z.string(),
  updatedAt: z.string(),
});

const assignmentSchema = z.object({
  cardId: z.string(),
  boardId: z.string(),
  columnId: nullableString,
  position: z.number().int(),
  createdAt: z.string(),
});

const tagSchema = z.object({
  id: z.string(),
  name: z.string(),
  color: z.string().default(DEFAULT_TAG_COLOR),
  scope: z.discriminatedUnion("kind", [
    z.object({ kind: z.literal("board"), boardId: z.string() }),
    z.object({ kind: z.literal("user"), ownerId: z.string() }),
  ]),
  createdAt: z.string(),
});

const outcomeSchema = z.object({
  action: z.string(),
  description: z.string(),
  success: z.boolean(),
});

const chatMessageSchema = z.object({
  id: z.string(),
  boardId: nullableString,
  userId: z.string(),
  message: z.string(),
  response: z.string(),
  actionsTaken: z.array(outcomeSchema).nullable().default(null),
  createdAt: z.string(),
});

const stateSchema = z.object({
  schemaVersion: z.literal(1),
  boards: z.record(z.string(), boardSchema).default({}),
  permissions: z.record(z.string(), z.record(z.string(), roleSchema)).default({}),
  columns: z.record(z.string(), columnSchema).default({}),
  cards: z.record(z.string(), cardSchema).default({}),
  assignments: z.record(z.string(), assignmentSchema).default({}),
  tags: z.record(z.string(), tagSchema).default({}),
  cardTags: z.record(z.string(), z.array(z.string())).default({}),
  chatMessages: z.array(chatMessageSchema).default([]),
});

export function parseSnapshot(raw: unknown): State {
  const parsed = stateSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ValidationError(`Invalid state snapshot: ${detail}`);
  }
  const state: State = parsed.data;
  repairPositions(state);
  return state;
}

function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

/** Memory store that writes a JSON snapshot of every committed transaction. */
export class JsonFileStore extends MemoryStore {
  private constructor(
    readonly filePath: string,
    initial: State,
  ) {
    super(initial);
  }

  static async open(filePath: string): Promise<JsonFileStore> {
    const resolved = path.resolve(filePath);
    let raw: string;
    try {
      raw = await fs.readFile(resolved, "utf8");
    } catch (error) {
      if (isErrnoCode(error, "ENOENT")) {
        log.info("no snapshot yet, starting empty", { path: resolved });
        return new JsonFileStore(resolved, createEmptyState());
      }
      throw new InfrastructureError(`Failed to read ${resolved}`, error);
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      throw new InfrastructureError(`Snapshot is not valid JSON: ${resolved}`, error);
    }
    const state = parseSnapshot(json);
    log.debug("snapshot loaded", {
      path: resolved,
      boards: Object.keys(state.boards).length,
      cards: Object.keys(state.cards).length,
    });
    return new JsonFileStore(resolved, state);
  }

  protected override async persist(next: State): Promise<void> {
    const tmpPath = `${this.filePath}.tmp.${process.pid}`;
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.rm(tmpPath, { force: true });
      await fs.writeFile(tmpPath, JSON.stringify(next, null, 2) + "\n", {
        encoding: "utf8",
        flag: "wx",
      });
      await fs.rename(tmpPath, this.filePath);
    } catch (error) {
      await fs.rm(tmpPath, { force: true }).catch((cleanupError: unknown) => {
        log.warn("failed to remove temp snapshot", { path: tmpPath, error: String(cleanupError) });
      });
      throw new InfrastructureError(`Failed to write ${this.filePath}`, error);
    }
  }
}
