import type { BoardId, UserId } from "./ids";
import type { State } from "./model";
import { boardsForUser, cardsInColumn, columnsOfBoard, tagsOfBoard } from "./state";

interface ActionExample {
  name: string;
  summary: string;
  params: Record<string, string>;
  message: string;
}

const BOARD_ACTIONS: ActionExample[] = [
  {
    name: "create_card",
    summary: "Create a new card",
    params: { column: "column name", title: "card title", body: "optional description" },
    message: "Created card...",
  },
  {
    name: "move_card",
    summary: "Move a card to another column",
    params: { card_title: "card to move", target_column: "destination column" },
    message: "Moved card...",
  },
  {
    name: "create_tag",
    summary: "Create a new tag",
    params: { name: "tag name", color: "#hex_color" },
    message: "Created tag...",
  },
  {
    name: "add_tag",
    summary: "Add a tag to a card",
    params: { card_title: "card title", tag_name: "tag to add" },
    message: "Added tag...",
  },
  {
    name: "list_cards",
    summary: "List cards, optionally in one column",
    params: { column: "optional column name" },
    message: "Here are the cards...",
  },
  { name: "list_tags", summary: "List the board's tags", params: {}, message: "Here are the tags..." },
  {
    name: "delete_column",
    summary: "Delete a column and its cards",
    params: { column: "column name" },
    message: "Deleted column...",
  },
  {
    name: "delete_tag",
    summary: "Delete a tag",
    params: { tag: "tag name" },
    message: "Deleted tag...",
  },
  {
    name: "delete_card",
    summary: "Delete a card",
    params: { card: "card title" },
    message: "Deleted card...",
  },
  {
    name: "no_action",
    summary: "Answer without changing anything",
    params: {},
    message: "Your response here...",
  },
];

const GLOBAL_ONLY_ACTIONS: ActionExample[] = [
  {
    name: "create_board",
    summary: "Create a new board",
    params: { name: "board name", description: "optional description" },
    message: "Created board...",
  },
  {
    name: "move_card_cross_board",
    summary: "Move a card from one board to another",
    params: {
      from_board: "source board",
      to_board: "target board",
      card: "card title",
      column: "destination column",
    },
    message: "Moved card...",
  },
];

function renderExamples(examples: ActionExample[], withBoard: boolean): string {
  return examples
    .map((ex, idx) => {
      const needsBoard = withBoard && ex.name !== "no_action" && ex.name !== "create_board";
      const params =
        needsBoard && !("from_board" in ex.params) ? { board: "board name", ...ex.params } : ex.params;
      const json = JSON.stringify({ action: ex.name, params, message: ex.message });
      return `${idx + 1}. ${ex.name}: ${ex.summary}\n   ${json}`;
    })
    .join("\n");
}

function contextSection(userContext: string | undefined): string {
  const text = userContext?.trim();
  return text ? `\nAbout the user:\n${text}\n` : "";
}

function listOrNone(items: string[]): string {
  return items.length > 0 ? items.join(", ") : "none";
}

export function buildBoardPrompt(
  state: State,
  boardId: BoardId,
  userContext?: string,
): string {
  const board = state.boards[boardId];
  const boardName = board?.name ?? boardId;
  const columns = columnsOfBoard(state, boardId).map(
    (c) => `${c.name} (${cardsInColumn(state, c.id).length} cards)`,
  );
  const tags = tagsOfBoard(state, boardId).map((t) => t.name);

  return `You are a task board assistant for the board "${boardName}".
${contextSection(userContext)}
Act by replying with JSON objects, one per action:
${renderExamples(BOARD_ACTIONS, false)}

Board right now:
- Board: ${boardName}
- Columns: ${listOrNone(columns)}
- Tags: ${listOrNone(tags)}

Always reply with valid JSON in the shapes above. Use "no_action" when the user only asks or chats.
`;
}

export function buildGlobalPrompt(state: State, userId: UserId, userContext?: string): string {
  const boards = boardsForUser(state, userId);
  if (boards.length === 0) {
    return `You are a task board assistant.
${contextSection(userContext)}
The user has no boards yet. You may create one:
${renderExamples(GLOBAL_ONLY_ACTIONS.slice(0, 1), false)}

Otherwise reply with {"action": "no_action", "params": {}, "message": "..."}.
`;
  }

  const summaries = boards.map(({ board, role }) => {
    const columns = columnsOfBoard(state, board.id);
    const cardCount = columns.reduce((n, c) => n + cardsInColumn(state, c.id).length, 0);
    const tags = tagsOfBoard(state, board.id).map((t) => t.name);
    return `- ${board.name} (role: ${role}, ${columns.length} columns: [${columns
      .map((c) => c.name)
      .join(", ")}], ${cardCount} cards, tags: [${listOrNone(tags)}])`;
  });

  return `You are a task board assistant with access to several boards.
${contextSection(userContext)}
Actions can target any of the user's boards; always name the board in "board".

Available actions:
${renderExamples([...GLOBAL_ONLY_ACTIONS, ...BOARD_ACTIONS], true)}

The user's boards:
${summaries.join("\n")}

Always reply with valid JSON. Use "no_action" for questions.
`;
}
