import { describe, expect, it } from "vitest";
import { MemoryStore } from "./store";

describe("MemoryStore", () => {
  it("discards the draft when a transaction throws", async () => {
    const store = new MemoryStore();
    await expect(
      store.transact((draft) => {
        draft.boards["b1"] = {
          id: "b1",
          name: "Half done",
          description: null,
          ownerId: "u1",
          createdAt: "2024-01-01T00:00:00.000Z",
          updatedAt: "2024-01-01T00:00:00.000Z",
        };
        throw new Error("midway");
      }),
    ).rejects.toThrow("midway");
    expect(await store.read((s) => Object.keys(s.boards))).toEqual([]);
  });

  it("keeps working after a failed transaction", async () => {
    const store = new MemoryStore();
    const failed = store.transact(() => {
      throw new Error("first");
    });
    const next = store.transact((draft) => {
      draft.cardTags["c1"] = ["t1"];
      return "ok";
    });
    await expect(failed).rejects.toThrow("first");
    await expect(next).resolves.toBe("ok");
    expect(await store.read((s) => s.cardTags)).toEqual({ c1: ["t1"] });
  });

  it("runs transactions one after another", async () => {
    const store = new MemoryStore();
    const runs = Array.from({ length: 20 }, (_, i) =>
      store.transact((draft) => {
        const count = draft.chatMessages.length;
        draft.chatMessages.push({
          id: `m${i}`,
          boardId: null,
          userId: "u1",
          message: String(count),
          response: "",
          actionsTaken: null,
          createdAt: "2024-01-01T00:00:00.000Z",
        });
      }),
    );
    await Promise.all(runs);
    const counts = await store.read((s) => s.chatMessages.map((msg) => msg.message));
    expect(counts).toEqual(Array.from({ length: 20 }, (_, i) => String(i)));
  });

  it("hands out copies, not the live state", async () => {
    const store = new MemoryStore();
    const snapshot = await store.read((s) => s);
    snapshot.boards["x"] = {
      id: "x",
      name: "Sneaky",
      description: null,
      ownerId: "u1",
      createdAt: "2024-01-01T00:00:00.000Z",
      updatedAt: "2024-01-01T00:00:00.000Z",
    };
    expect(await store.read((s) => Object.keys(s.boards))).toEqual([]);
  });
});
