import type { BoardId, CardId, ChatMessageId, ColumnId, TagId, UserId } from "./ids";

export type SchemaVersion = 1;

const BOARD_ROLES = ["owner", "editor", "reader"] as const;
const CARD_VISIBILITIES = ["private", "restricted", "public"] as const;
const CARD_STATUSES = ["open", "in_progress", "done", "closed"] as const;

export type BoardRole = (typeof BOARD_ROLES)[number];
export type CardVisibility = (typeof CARD_VISIBILITIES)[number];
export type CardStatus = (typeof CARD_STATUSES)[number];

export const DEFAULT_TAG_COLOR = "#6c757d";

function normalizeEnumInput(raw: string): string {
  return raw.trim().toLowerCase();
}

export function parseRole(raw: string): BoardRole | undefined {
  const value = normalizeEnumInput(raw);
  return BOARD_ROLES.find((r) => r === value);
}

export function parseVisibility(raw: string): CardVisibility | undefined {
  const value = normalizeEnumInput(raw);
  return CARD_VISIBILITIES.find((v) => v === value);
}

/** Visibility as read back from storage: anything unrecognized is treated as private. */
export function storedVisibility(raw: unknown): CardVisibility {
  if (typeof raw !== "string") return "private";
  return parseVisibility(raw) ?? "private";
}

/** Accepts `in_progress`, `In-Progress`, `inprogress` and so on. */
export function parseStatus(raw: string): CardStatus | undefined {
  const value = normalizeEnumInput(raw).replace(/[_\s-]/g, "");
  return CARD_STATUSES.find((s) => s.replace(/_/g, "") === value);
}

export function formatStatus(status: CardStatus): string {
  switch (status) {
    case "open":
      return "Open";
    case "in_progress":
      return "In Progress";
    case "done":
      return "Done";
    case "closed":
      return "Closed";
  }
}

export interface Board {
  id: BoardId;
  name: string;
  description: string | null;
  ownerId: UserId;
  createdAt: string;
  updatedAt: string;
}

export interface Column {
  id: ColumnId;
  boardId: BoardId;
  name: string;
  position: number;
  createdAt: string;
  updatedAt: string;
}

export interface Card {
  id: CardId;
  /** `null` for standalone (inbox) cards and for cards whose column was deleted. */
  columnId: ColumnId | null;
  position: number | null;
  title: string;
  body: string | null;
  visibility: CardVisibility;
  status: CardStatus;
  ownerId: UserId | null;
  createdBy: UserId;
  startDate: string | null;
  endDate: string | null;
  dueDate: string | null;
  createdAt: string;
  updatedAt: string;
}

/** Places a card on a board in addition to its primary column. */
export interface CardBoardAssignment {
  cardId: CardId;
  boardId: BoardId;
  columnId: ColumnId | null;
  position: number;
  createdAt: string;
}

export type TagScope = { kind: "board"; boardId: BoardId } | { kind: "user"; ownerId: UserId };

export interface Tag {
  id: TagId;
  name: string;
  color: string;
  scope: TagScope;
  createdAt: string;
}

export interface ActionOutcome {
  action: string;
  description: string;
  success: boolean;
}

export interface ChatMessage {
  id: ChatMessageId;
  /** `null` for the global (cross-board) conversation. */
  boardId: BoardId | null;
  userId: UserId;
  message: string;
  response: string;
  actionsTaken: ActionOutcome[] | null;
  createdAt: string;
}

export interface State {
  schemaVersion: SchemaVersion;
  boards: Record<BoardId, Board>;
  permissions: Record<BoardId, Record<UserId, BoardRole>>;
  columns: Record<ColumnId, Column>;
  cards: Record<CardId, Card>;
  assignments: Record<string, CardBoardAssignment>;
  tags: Record<TagId, Tag>;
  cardTags: Record<CardId, TagId[]>;
  chatMessages: ChatMessage[];
}

export function assignmentKey(cardId: CardId, boardId: BoardId): string {
  return `${cardId}:${boardId}`;
}

export function createEmptyState(): State {
  return {
    schemaVersion: 1,
    boards: {},
    permissions: {},
    columns: {},
    cards: {},
    assignments: {},
    tags: {},
    cardTags: {},
    chatMessages: [],
  };
}
