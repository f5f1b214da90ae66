/**
 * Chat action kinds and their parameters. Models are loose with naming, so each
 * field accepts a few spellings; the table below is the single place those
 * spellings are listed.
 */

const KNOWN_KINDS = [
  "create_board",
  "create_card",
  "move_card",
  "move_card_cross_board",
  "create_tag",
  "add_tag",
  "delete_column",
  "delete_tag",
  "delete_card",
  "list_cards",
  "list_tags",
  "no_action",
] as const;

export type KnownActionKind = (typeof KNOWN_KINDS)[number];
export type ChatActionKind = KnownActionKind | "unknown";

/** Kinds that never change anything; they are answered in the reply text only. */
export const READ_ONLY_KINDS: ReadonlySet<ChatActionKind> = new Set<ChatActionKind>([
  "list_cards",
  "list_tags",
  "no_action",
]);

/** Only meaningful when the conversation is not tied to one board. */
export const GLOBAL_ONLY_KINDS: ReadonlySet<ChatActionKind> = new Set<ChatActionKind>([
  "create_board",
  "move_card_cross_board",
]);

/** `Move_Card`, `move-card` and `movecard` all name the same action. */
export function normalizeActionName(name: string): string {
  return name.trim().toLowerCase().replace(/[_\s-]/g, "");
}

export function actionKind(name: string): ChatActionKind {
  const key = normalizeActionName(name);
  return KNOWN_KINDS.find((k) => k.replace(/_/g, "") === key) ?? "unknown";
}

const FIELD_ALIASES = {
  create_board: {
    name: ["name", "board_name", "title"],
    description: ["description", "desc"],
  },
  create_card: {
    column: ["column", "column_name", "in"],
    title: ["title", "name", "card_title"],
    body: ["body", "description", "content"],
  },
  move_card: {
    card: ["card_title", "card", "title", "name"],
    column: ["target_column", "column", "to", "destination"],
  },
  move_card_cross_board: {
    fromBoard: ["from_board", "source_board", "source"],
    toBoard: ["to_board", "target_board", "destination"],
    card: ["card", "card_title", "title"],
    column: ["column", "target_column", "to_column"],
  },
  create_tag: {
    name: ["name", "tag_name", "tag"],
    color: ["color", "hex_color"],
  },
  add_tag: {
    card: ["card_title", "card", "title"],
    tag: ["tag_name", "tag", "name"],
  },
  delete_column: {
    column: ["column", "column_name", "name"],
  },
  delete_tag: {
    tag: ["tag", "tag_name", "name"],
  },
  delete_card: {
    card: ["card", "card_title", "title", "name"],
  },
} as const satisfies Record<string, Record<string, readonly string[]>>;

export const BOARD_ALIASES = ["board", "board_name"] as const;

/** First alias holding a non-blank string (or a number), trimmed. */
export function pickParam(
  params: Record<string, unknown>,
  aliases: readonly string[],
): string | undefined {
  for (const key of aliases) {
    const value = params[key];
    if (typeof value === "number" && Number.isFinite(value)) return String(value);
    if (typeof value === "string" && value.trim()) return value.trim();
  }
  return undefined;
}

export type MutatingAction =
  | { kind: "create_board"; name: string; description: string | null }
  | { kind: "create_card"; column: string; title: string; body: string | null }
  | { kind: "move_card"; card: string; column: string }
  | {
      kind: "move_card_cross_board";
      fromBoard: string;
      toBoard: string;
      card: string;
      column: string;
    }
  | { kind: "create_tag"; name: string; color: string | undefined }
  | { kind: "add_tag"; card: string; tag: string }
  | { kind: "delete_column"; column: string }
  | { kind: "delete_tag"; tag: string }
  | { kind: "delete_card"; card: string };

export type MutatingKind = MutatingAction["kind"];

export type DecodeResult = { ok: true; action: MutatingAction } | { ok: false; message: string };

function missing(text: string, params: Record<string, unknown>): DecodeResult {
  return { ok: false, message: `${text}. Received params: ${JSON.stringify(params)}` };
}

/** Reads the typed parameters of a mutating action, or explains what is missing. */
export function decodeAction(kind: MutatingKind, params: Record<string, unknown>): DecodeResult {
  switch (kind) {
    case "create_board": {
      const a = FIELD_ALIASES.create_board;
      const name = pickParam(params, a.name);
      if (!name) return missing("Missing board name", params);
      return {
        ok: true,
        action: { kind, name, description: pickParam(params, a.description) ?? null },
      };
    }
    case "create_card": {
      const a = FIELD_ALIASES.create_card;
      const column = pickParam(params, a.column);
      const title = pickParam(params, a.title);
      if (!column || !title) return missing("Missing column or title", params);
      return { ok: true, action: { kind, column, title, body: pickParam(params, a.body) ?? null } };
    }
    case "move_card": {
      const a = FIELD_ALIASES.move_card;
      const card = pickParam(params, a.card);
      const column = pickParam(params, a.column);
      if (!card || !column) return missing("Missing card_title or target_column", params);
      return { ok: true, action: { kind, card, column } };
    }
    case "move_card_cross_board": {
      const a = FIELD_ALIASES.move_card_cross_board;
      const fromBoard = pickParam(params, a.fromBoard);
      const toBoard = pickParam(params, a.toBoard);
      const card = pickParam(params, a.card);
      const column = pickParam(params, a.column);
      if (!fromBoard || !toBoard || !card || !column) {
        return {
          ok: false,
          message: `Missing params. Need from_board, to_board, card, column. Got: ${JSON.stringify(params)}`,
        };
      }
      return { ok: true, action: { kind, fromBoard, toBoard, card, column } };
    }
    case "create_tag": {
      const a = FIELD_ALIASES.create_tag;
      const name = pickParam(params, a.name);
      if (!name) return missing("Missing tag name", params);
      return { ok: true, action: { kind, name, color: pickParam(params, a.color) } };
    }
    case "add_tag": {
      const a = FIELD_ALIASES.add_tag;
      const card = pickParam(params, a.card);
      const tag = pickParam(params, a.tag);
      if (!card || !tag) return missing("Missing card_title or tag_name", params);
      return { ok: true, action: { kind, card, tag } };
    }
    case "delete_column": {
      const column = pickParam(params, FIELD_ALIASES.delete_column.column);
      if (!column) return missing("Missing column name", params);
      return { ok: true, action: { kind, column } };
    }
    case "delete_tag": {
      const tag = pickParam(params, FIELD_ALIASES.delete_tag.tag);
      if (!tag) return missing("Missing tag name", params);
      return { ok: true, action: { kind, tag } };
    }
    case "delete_card": {
      const card = pickParam(params, FIELD_ALIASES.delete_card.card);
      if (!card) return missing("Missing card title", params);
      return { ok: true, action: { kind, card } };
    }
  }
}

export function isMutatingKind(kind: ChatActionKind): kind is MutatingKind {
  return kind !== "unknown" && !READ_ONLY_KINDS.has(kind);
}

export function isReadOnlyAction(name: string): boolean {
  return READ_ONLY_KINDS.has(actionKind(name));
}
