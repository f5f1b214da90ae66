import {
  ChatService,
  OllamaClient,
  createBoard,
  createCard,
  createColumn,
  listBoardCards,
  listBoardsForUser,
  listColumns,
  type BoardId,
  type ChatReply,
  type ChatTurn,
  type LanguageModel,
  type Store,
  type UserId,
} from "@boardchat/sdk";

export interface DemoArgs {
  dataPath?: string;
  ask?: string;
}

export function parseArgs(argv: string[]): DemoArgs {
  const out: DemoArgs = {};
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--data" || arg === "--ask") {
      const value = argv[i + 1];
      if (!value) throw new Error(`Usage: npm run demo -- [--data <path>] [--ask <message>]`);
      if (arg === "--data") out.dataPath = value;
      else out.ask = value;
      i++;
    } else if (arg?.startsWith("--data=")) {
      out.dataPath = arg.slice("--data=".length);
    } else if (arg?.startsWith("--ask=")) {
      out.ask = arg.slice("--ask=".length);
    }
  }
  return out;
}

/** Replays canned replies in order; used when no model server is around. */
export class ScriptedModel implements LanguageModel {
  readonly model = "scripted";
  readonly seen: ChatTurn[][] = [];

  constructor(private readonly replies: string[]) {}

  async chat(messages: ChatTurn[]): Promise<string> {
    this.seen.push(messages);
    const reply = this.replies[this.seen.length - 1];
    if (reply === undefined) throw new Error("Scripted model has no reply left");
    return reply;
  }
}

export const SCRIPTED_REPLY = [
  "Sure, I'll set that up.",
  "```json",
  JSON.stringify(
    [
      {
        action: "create_card",
        params: { column: "todo", title: "Write release notes" },
        message: "Added the release notes and started on the login bug.",
      },
      { action: "move_card", params: { card: "Fix login bug", column: "Doing" } },
      { action: "add_tag", params: { card_title: "Fix login bug", tag: "urgent" } },
    ],
    null,
    2,
  ),
  "```",
].join("\n");

export const DEMO_USER: UserId = "demo-user";

/** Creates the demo board unless the user already has one. */
export async function seedBoard(store: Store, userId: UserId): Promise<BoardId> {
  const existing = await listBoardsForUser({ store, userId });
  const first = existing[0];
  if (first) return first.board.id;

  const board = await createBoard({ store, actorId: userId, name: "Launch", description: "Demo board" });
  const todo = await createColumn({ store, actorId: userId, boardId: board.id, name: "Todo" });
  await createColumn({ store, actorId: userId, boardId: board.id, name: "Doing" });
  await createColumn({ store, actorId: userId, boardId: board.id, name: "Done" });
  await createCard({ store, actorId: userId, columnId: todo.id, title: "Fix login bug" });
  await createCard({ store, actorId: userId, columnId: todo.id, title: "Draft pricing page" });
  return board.id;
}

export async function pickModel(args: {
  ask?: string;
  client: OllamaClient;
}): Promise<{ model: LanguageModel; message: string }> {
  if (args.ask && (await args.client.isAvailable())) {
    return { model: args.client, message: args.ask };
  }
  return {
    model: new ScriptedModel([SCRIPTED_REPLY]),
    message: args.ask ?? "Add release notes to todo and start on the login bug",
  };
}

export async function renderBoard(store: Store, userId: UserId, boardId: BoardId): Promise<string> {
  const columns = await listColumns({ store, actorId: userId, boardId });
  const entries = await listBoardCards({ store, actorId: userId, boardId });
  const lines: string[] = [];
  for (const column of columns) {
    lines.push(`${column.name}:`);
    for (const entry of entries) {
      if (entry.columnId === column.id) lines.push(`  - ${entry.card.title}`);
    }
  }
  return lines.join("\n");
}

export function renderReply(reply: ChatReply): string {
  const lines = [`assistant: ${reply.response}`];
  for (const outcome of reply.actionsTaken) {
    lines.push(`  [${outcome.success ? "ok" : "failed"}] ${outcome.action}: ${outcome.description}`);
  }
  return lines.join("\n");
}

export async function runDemo(args: {
  store: Store;
  model: LanguageModel;
  message: string;
  timeoutMs: number;
  userId?: UserId;
}): Promise<{ boardId: BoardId; reply: ChatReply; board: string }> {
  const userId = args.userId ?? DEMO_USER;
  const boardId = await seedBoard(args.store, userId);
  const chat = new ChatService({ store: args.store, model: args.model, timeoutMs: args.timeoutMs });
  const reply = await chat.sendBoardMessage({
    actor: { userId, context: "Runs the launch checklist." },
    boardId,
    message: args.message,
  });
  return { boardId, reply, board: await renderBoard(args.store, userId, boardId) };
}
