import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { JsonFileStore, parseSnapshot } from "./fileStore";
import { InfrastructureError, ValidationError } from "./errors";
import * as c from "./commands";

let dir: string;

beforeEach(async () => {
  dir = await fs.mkdtemp(path.join(os.tmpdir(), "boardchat-store-"));
});

afterEach(async () => {
  await fs.rm(dir, { recursive: true, force: true });
});

const baseCard = {
  id: "c1",
  columnId: "col1",
  position: 0,
  title: "Card",
  body: null,
  status: "open",
  ownerId: null,
  createdBy: "u1",
  startDate: null,
  endDate: null,
  dueDate: null,
  createdAt: "2024-01-01T00:00:00.000Z",
  updatedAt: "2024-01-01T00:00:00.000Z",
};

function snapshotWith(extra: Record<string, unknown>) {
  return {
    schemaVersion: 1,
    boards: {
      b1: {
        id: "b1",
        name: "Work",
        description: null,
        ownerId: "u1",
        createdAt: "2024-01-01T00:00:00.000Z",
        updatedAt: "2024-01-01T00:00:00.000Z",
      },
    },
    permissions: { b1: { u1: "owner" } },
    columns: {
      col1: {
        id: "col1",
        boardId: "b1",
        name: "Todo",
        position: 0,
        createdAt: "2024-01-01T00:00:00.000Z",
        updatedAt: "2024-01-01T00:00:00.000Z",
      },
    },
    ...extra,
  };
}

describe("JsonFileStore", () => {
  it("starts empty when the file does not exist", async () => {
    const store = await JsonFileStore.open(path.join(dir, "state.json"));
    expect(await store.read((s) => Object.keys(s.boards))).toEqual([]);
  });

  it("writes every committed transaction and reads it back", async () => {
    const file = path.join(dir, "nested", "state.json");
    const store = await JsonFileStore.open(file);
    const board = await c.createBoard({ store, actorId: "u1", name: "Work" });
    const column = await c.createColumn({ store, actorId: "u1", boardId: board.id, name: "Todo" });
    await c.createCard({ store, actorId: "u1", columnId: column.id, title: "Persist me" });

    const reopened = await JsonFileStore.open(file);
    const titles = await reopened.read((s) => Object.values(s.cards).map((card) => card.title));
    expect(titles).toEqual(["Persist me"]);
    const files = await fs.readdir(path.dirname(file));
    expect(files).toEqual(["state.json"]);
  });

  it("does not write a rejected transaction", async () => {
    const file = path.join(dir, "state.json");
    const store = await JsonFileStore.open(file);
    await c.createBoard({ store, actorId: "u1", name: "Work" });
    const before = await fs.readFile(file, "utf8");
    await expect(c.createBoard({ store, actorId: "u1", name: "  " })).rejects.toThrow(ValidationError);
    expect(await fs.readFile(file, "utf8")).toBe(before);
  });

  it("fails with an infrastructure error on unreadable JSON", async () => {
    const file = path.join(dir, "state.json");
    await fs.writeFile(file, "{ not json", "utf8");
    await expect(JsonFileStore.open(file)).rejects.toThrow(InfrastructureError);
  });

  it("reports a write failure and keeps the previous state", async () => {
    const blocker = path.join(dir, "blocker");
    const store = await JsonFileStore.open(path.join(blocker, "state.json"));
    await fs.writeFile(blocker, "a file, not a directory", "utf8");
    await expect(c.createBoard({ store, actorId: "u1", name: "Work" })).rejects.toThrow(
      InfrastructureError,
    );
    expect(await store.read((s) => Object.keys(s.boards))).toEqual([]);
  });
});

describe("parseSnapshot", () => {
  it("reads an unknown visibility as private", () => {
    const state = parseSnapshot(
      snapshotWith({ cards: { c1: { ...baseCard, visibility: "team-only" } } }),
    );
    expect(state.cards["c1"]?.visibility).toBe("private");
  });

  it("normalizes status spellings", () => {
    const state = parseSnapshot(
      snapshotWith({ cards: { c1: { ...baseCard, visibility: "public", status: "In_Progress" } } }),
    );
    expect(state.cards["c1"]?.status).toBe("in_progress");
  });

  it("rejects unknown roles and statuses", () => {
    expect(() => parseSnapshot(snapshotWith({ permissions: { b1: { u1: "admin" } } }))).toThrow(
      "Unknown board role: admin",
    );
    expect(() =>
      parseSnapshot(snapshotWith({ cards: { c1: { ...baseCard, status: "someday" } } })),
    ).toThrow("Unknown card status: someday");
  });

  it("repairs gaps in stored positions", () => {
    const state = parseSnapshot(
      snapshotWith({
        cards: {
          c1: { ...baseCard, id: "c1", position: 4, visibility: "public" },
          c2: { ...baseCard, id: "c2", position: 9, visibility: "public" },
        },
      }),
    );
    expect([state.cards["c1"]?.position, state.cards["c2"]?.position]).toEqual([0, 1]);
  });
});
