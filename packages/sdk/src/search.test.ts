import { describe, expect, it } from "vitest";
import { MemoryStore } from "./store";
import { listBoardCards } from "./search";
import * as c from "./commands";

const OWNER = "owner-1";
const READER = "reader-1";

async function setup() {
  const store = new MemoryStore();
  const board = await c.createBoard({ store, actorId: OWNER, name: "Work" });
  await c.addPermission({ store, actorId: OWNER, boardId: board.id, userId: READER, role: "reader" });
  const todo = await c.createColumn({ store, actorId: OWNER, boardId: board.id, name: "Todo" });
  const done = await c.createColumn({ store, actorId: OWNER, boardId: board.id, name: "Done" });
  return { store, board, todo, done };
}

describe("listBoardCards", () => {
  it("orders column cards, then placed cards, then placed cards without a column", async () => {
    const { store, board, todo, done } = await setup();
    await c.createCard({ store, actorId: OWNER, columnId: done.id, title: "D1" });
    await c.createCard({ store, actorId: OWNER, columnId: todo.id, title: "T1" });
    await c.createCard({ store, actorId: OWNER, columnId: todo.id, title: "T2" });
    const loose = await c.createStandaloneCard({ store, actorId: OWNER, title: "Loose", visibility: "restricted" });
    const placed = await c.createStandaloneCard({ store, actorId: OWNER, title: "Placed", visibility: "restricted" });
    await c.assignCardToBoard({ store, actorId: OWNER, cardId: loose.id, boardId: board.id });
    await c.assignCardToBoard({ store, actorId: OWNER, cardId: placed.id, boardId: board.id, columnId: todo.id });

    const entries = await listBoardCards({ store, actorId: READER, boardId: board.id });
    expect(entries.map((e) => [e.card.title, e.placed])).toEqual([
      ["T1", false],
      ["T2", false],
      ["Placed", true],
      ["D1", false],
      ["Loose", true],
    ]);
  });

  it("hides private cards from readers", async () => {
    const { store, board, todo } = await setup();
    await c.createCard({ store, actorId: OWNER, columnId: todo.id, title: "Open" });
    await c.createCard({ store, actorId: OWNER, columnId: todo.id, title: "Hidden", visibility: "private" });
    const forReader = await listBoardCards({ store, actorId: READER, boardId: board.id });
    const forOwner = await listBoardCards({ store, actorId: OWNER, boardId: board.id });
    expect(forReader.map((e) => e.card.title)).toEqual(["Open"]);
    expect(forOwner.map((e) => e.card.title)).toEqual(["Open", "Hidden"]);
  });

  it("filters by words, tags and date ranges", async () => {
    const { store, board, todo } = await setup();
    const a = await c.createCard({
      store,
      actorId: OWNER,
      columnId: todo.id,
      title: "Quarterly report",
      body: "numbers for finance",
      dueDate: "2024-03-31",
    });
    await c.createCard({ store, actorId: OWNER, columnId: todo.id, title: "Team lunch", dueDate: "2024-02-10" });
    await c.createCard({ store, actorId: OWNER, columnId: todo.id, title: "Undated report" });
    const tag = await c.createTag({ store, actorId: OWNER, boardId: board.id, name: "finance" });
    await c.addTagToCard({ store, actorId: OWNER, cardId: a.id, tagId: tag.id });

    const titles = async (filter: Parameters<typeof listBoardCards>[0]["filter"]) =>
      (await listBoardCards({ store, actorId: OWNER, boardId: board.id, filter })).map((e) => e.card.title);

    expect(await titles({ query: "REPORT" })).toEqual(["Quarterly report", "Undated report"]);
    expect(await titles({ query: "report finance" })).toEqual(["Quarterly report"]);
    expect(await titles({ tagIds: [tag.id] })).toEqual(["Quarterly report"]);
    expect(await titles({ dueDateFrom: "2024-03-01" })).toEqual(["Quarterly report"]);
    expect(await titles({ dueDateTo: "2024-02-28" })).toEqual(["Team lunch"]);
  });

  it("refuses users without a role", async () => {
    const { store, board } = await setup();
    await expect(listBoardCards({ store, actorId: "stranger", boardId: board.id })).rejects.toThrow(
      "Board not found or access denied",
    );
  });
});
