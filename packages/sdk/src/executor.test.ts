import { describe, expect, it } from "vitest";
import { MemoryStore } from "./store";
import { executeBoardAction, executeGlobalAction } from "./executor";
import { InfrastructureError } from "./errors";
import type { State } from "./model";
import type { ActionDescriptor } from "./parser";
import * as c from "./commands";

const OWNER = "owner-1";
const READER = "reader-1";

async function setup() {
  const store = new MemoryStore();
  const board = await c.createBoard({ store, actorId: OWNER, name: "Work" });
  await c.addPermission({ store, actorId: OWNER, boardId: board.id, userId: READER, role: "reader" });
  const todo = await c.createColumn({ store, actorId: OWNER, boardId: board.id, name: "Todo" });
  const done = await c.createColumn({ store, actorId: OWNER, boardId: board.id, name: "Done" });
  const report = await c.createCard({ store, actorId: OWNER, columnId: todo.id, title: "Report" });
  return { store, board, todo, done, report };
}

function action(name: string, params: Record<string, unknown> = {}): ActionDescriptor {
  return { action: name, params };
}

describe("executeBoardAction", () => {
  it("moves a card to the top of another column", async () => {
    const { store, board, done, report } = await setup();
    await c.createCard({ store, actorId: OWNER, columnId: done.id, title: "Old" });

    const result = await executeBoardAction({
      store,
      actorId: OWNER,
      boardId: board.id,
      descriptor: action("move_card", { card_title: "report", target_column: "DONE" }),
    });

    expect(result).toEqual({ action: "move_card", description: "Moved 'Report' to 'Done'", success: true });
    const card = await c.getCard({ store, actorId: OWNER, cardId: report.id });
    expect(card).toMatchObject({ columnId: done.id, position: 0 });
  });

  it("denies a reader without changing anything", async () => {
    const { store, board } = await setup();
    const before = await store.read((s) => s);

    const result = await executeBoardAction({
      store,
      actorId: READER,
      boardId: board.id,
      descriptor: action("create_card", { column: "Todo", title: "Sneaky" }),
    });

    expect(result).toEqual({
      action: "create_card",
      description: "You don't have permission to edit board 'Work'",
      success: false,
    });
    expect(await store.read((s) => s)).toEqual(before);
  });

  it("creates chat cards as restricted cards without an owner", async () => {
    const { store, board, todo } = await setup();
    const result = await executeBoardAction({
      store,
      actorId: OWNER,
      boardId: board.id,
      descriptor: action("CreateCard", { in: "todo", name: "Draft", content: "first pass" }),
    });
    expect(result.description).toBe("Created card 'Draft' in column 'Todo'");

    const cards = await store.read((s: State) => Object.values(s.cards).filter((card) => card.title === "Draft"));
    expect(cards).toHaveLength(1);
    expect(cards[0]).toMatchObject({
      columnId: todo.id,
      position: 1,
      body: "first pass",
      visibility: "restricted",
      ownerId: null,
      createdBy: OWNER,
    });
  });

  it("depends on order within a batch", async () => {
    const { store, board } = await setup();
    const run = (descriptor: ActionDescriptor) =>
      executeBoardAction({ store, actorId: OWNER, boardId: board.id, descriptor });

    const reversedFirst = await run(action("add_tag", { card_title: "Report", tag_name: "urgent" }));
    const create = await run(action("create_tag", { name: "urgent", color: "#ff0000" }));
    const add = await run(action("add_tag", { card_title: "Report", tag_name: "urgent" }));

    expect(reversedFirst).toEqual({
      action: "add_tag",
      description: "Tag 'urgent' not found",
      success: false,
    });
    expect(create).toEqual({ action: "create_tag", description: "Created tag 'urgent'", success: true });
    expect(add).toEqual({
      action: "add_tag",
      description: "Added tag 'urgent' to 'Report'",
      success: true,
    });
  });

  it("reports unresolved names", async () => {
    const { store, board } = await setup();
    const run = (descriptor: ActionDescriptor) =>
      executeBoardAction({ store, actorId: OWNER, boardId: board.id, descriptor });

    expect((await run(action("move_card", { card: "Report", column: "Later" }))).description).toBe(
      "Column 'Later' not found",
    );
    expect((await run(action("move_card", { card: "Nope", column: "Done" }))).description).toBe(
      "Card 'Nope' not found",
    );
    expect((await run(action("delete_tag", { tag: "ghost" }))).description).toBe("Tag 'ghost' not found");
    expect((await run(action("delete_column", { column: "Later" }))).description).toBe(
      "Column 'Later' not found",
    );
  });

  it("reports missing parameters with what was received", async () => {
    const { store, board } = await setup();
    const result = await executeBoardAction({
      store,
      actorId: OWNER,
      boardId: board.id,
      descriptor: action("create_card", { title: "No column" }),
    });
    expect(result).toEqual({
      action: "create_card",
      description: 'Missing column or title. Received params: {"title":"No column"}',
      success: false,
    });
  });

  it("answers read-only, unknown and global-only actions without touching the board", async () => {
    const { store, board } = await setup();
    const run = (descriptor: ActionDescriptor) =>
      executeBoardAction({ store, actorId: OWNER, boardId: board.id, descriptor });

    expect(await run(action("list_cards"))).toEqual({
      action: "list_cards",
      description: "No modification made",
      success: true,
    });
    expect(await run(action("archive"))).toEqual({
      action: "archive",
      description: "Unknown action: archive",
      success: false,
    });
    expect(await run(action("create_board", { name: "X" }))).toEqual({
      action: "create_board",
      description: "This action is only available in global chat",
      success: false,
    });
  });

  it("deletes cards and columns by name", async () => {
    const { store, board, todo } = await setup();
    const run = (descriptor: ActionDescriptor) =>
      executeBoardAction({ store, actorId: OWNER, boardId: board.id, descriptor });

    expect((await run(action("delete_card", { title: "report" }))).description).toBe(
      "Deleted card 'Report'",
    );
    expect((await run(action("delete_column", { column_name: "todo" }))).description).toBe(
      "Deleted column 'Todo'",
    );
    const columns = await c.listColumns({ store, actorId: OWNER, boardId: board.id });
    expect(columns.map((col) => [col.name, col.position])).toEqual([["Done", 0]]);
    expect(columns.some((col) => col.id === todo.id)).toBe(false);
  });

  it("lets storage failures escape", async () => {
    const { board } = await setup();
    const failing = {
      read: () => Promise.reject(new InfrastructureError("disk gone")),
      transact: () => Promise.reject(new InfrastructureError("disk gone")),
    };
    await expect(
      executeBoardAction({
        store: failing,
        actorId: OWNER,
        boardId: board.id,
        descriptor: action("create_tag", { name: "x" }),
      }),
    ).rejects.toThrow("disk gone");
  });
});

describe("executeGlobalAction", () => {
  it("creates a board owned by the actor", async () => {
    const store = new MemoryStore();
    const result = await executeGlobalAction({
      store,
      actorId: READER,
      descriptor: action("create_board", { title: "Garden", desc: "Spring" }),
    });
    expect(result).toEqual({ action: "create_board", description: "Created board 'Garden'", success: true });
    const boards = await c.listBoardsForUser({ store, userId: READER });
    expect(boards.map((b) => [b.board.name, b.board.description, b.role])).toEqual([
      ["Garden", "Spring", "owner"],
    ]);
  });

  it("needs a board for board actions", async () => {
    const { store } = await setup();
    const missing = await executeGlobalAction({
      store,
      actorId: OWNER,
      descriptor: action("create_tag", { name: "x" }),
    });
    expect(missing.description).toBe(
      'Missing board name. Please specify which board. Params: {"name":"x"}',
    );

    const unknown = await executeGlobalAction({
      store,
      actorId: OWNER,
      descriptor: action("create_tag", { board: "Home", name: "x" }),
    });
    expect(unknown.description).toBe("Board 'Home' not found");
  });

  it("runs board actions on the named board", async () => {
    const { store } = await setup();
    const ok = await executeGlobalAction({
      store,
      actorId: OWNER,
      descriptor: action("move_card", { board_name: "work", card: "Report", to: "Done" }),
    });
    expect(ok).toEqual({ action: "move_card", description: "Moved 'Report' to 'Done'", success: true });

    const denied = await executeGlobalAction({
      store,
      actorId: READER,
      descriptor: action("create_tag", { board: "Work", name: "x" }),
    });
    expect(denied.description).toBe("You don't have permission to edit board 'Work'");
  });

  it("moves a card across boards keeping its id", async () => {
    const { store, report } = await setup();
    const home = await c.createBoard({ store, actorId: OWNER, name: "Home" });
    const list = await c.createColumn({ store, actorId: OWNER, boardId: home.id, name: "List" });
    await c.createCard({ store, actorId: OWNER, columnId: list.id, title: "Groceries" });

    const result = await executeGlobalAction({
      store,
      actorId: OWNER,
      descriptor: action("move_card_cross_board", {
        from_board: "work",
        to_board: "home",
        card_title: "report",
        to_column: "list",
      }),
    });

    expect(result).toEqual({
      action: "move_card_cross_board",
      description: "Moved 'Report' from 'Work' to 'Home' (column 'List')",
      success: true,
    });
    expect(await c.getCard({ store, actorId: OWNER, cardId: report.id })).toMatchObject({
      columnId: list.id,
      position: 1,
    });
  });

  it("explains cross-board failures", async () => {
    const { store, board } = await setup();
    const home = await c.createBoard({ store, actorId: OWNER, name: "Home" });
    await c.createColumn({ store, actorId: OWNER, boardId: home.id, name: "List" });
    await c.addPermission({ store, actorId: OWNER, boardId: home.id, userId: READER, role: "editor" });
    const run = (actorId: string, params: Record<string, unknown>) =>
      executeGlobalAction({ store, actorId, descriptor: action("move_card_cross_board", params) });

    expect((await run(OWNER, { from_board: "Nope", to_board: "Home", card: "Report", column: "List" })).description).toBe(
      "Source board 'Nope' not found",
    );
    expect((await run(OWNER, { from_board: "Work", to_board: "Nope", card: "Report", column: "List" })).description).toBe(
      "Target board 'Nope' not found",
    );
    expect((await run(OWNER, { from_board: "Work", to_board: "Home", card: "Ghost", column: "List" })).description).toBe(
      "Card 'Ghost' not found in board 'Work'",
    );
    expect((await run(OWNER, { from_board: "Work", to_board: "Home", card: "Report", column: "Ghost" })).description).toBe(
      "Column 'Ghost' not found in board 'Home'",
    );
    expect((await run(READER, { from_board: "Work", to_board: "Home", card: "Report", column: "List" })).description).toBe(
      `You don't have permission to edit board '${board.name}'`,
    );
  });
});
