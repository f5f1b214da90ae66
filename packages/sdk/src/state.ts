import type { BoardId, CardId, ColumnId, TagId, UserId } from "./ids";
import type {
  Board,
  BoardRole,
  Card,
  CardBoardAssignment,
  Column,
  State,
  Tag,
} from "./model";
import type { MaybeRole } from "./access";

/**
 * Read helpers over a state snapshot (or a transaction draft). Nothing here
 * checks permissions.
 */

function sortByPosition<T extends { id: string; position: number }>(items: T[]): T[] {
  return [...items].sort((a, b) => {
    if (a.position !== b.position) return a.position - b.position;
    return a.id.localeCompare(b.id);
  });
}

function byCreatedAt<T extends { createdAt: string }>(items: T[]): T[] {
  // Stable sort: rows created in the same millisecond keep insertion order.
  return [...items].sort((a, b) => a.createdAt.localeCompare(b.createdAt));
}

export function getBoardRole(state: State, boardId: BoardId, userId: UserId): MaybeRole {
  return state.permissions[boardId]?.[userId];
}

export interface BoardWithRole {
  board: Board;
  role: BoardRole;
}

/** Boards the user holds any role on, oldest first. */
export function boardsForUser(state: State, userId: UserId): BoardWithRole[] {
  const out: BoardWithRole[] = [];
  for (const board of byCreatedAt(Object.values(state.boards))) {
    const role = getBoardRole(state, board.id, userId);
    if (role) out.push({ board, role });
  }
  return out;
}

export function columnsOfBoard(state: State, boardId: BoardId): Column[] {
  return sortByPosition(Object.values(state.columns).filter((c) => c.boardId === boardId));
}

export function cardsInColumn(state: State, columnId: ColumnId): Card[] {
  return Object.values(state.cards)
    .filter((c) => c.columnId === columnId)
    .sort((a, b) => {
      const pa = a.position ?? 0;
      const pb = b.position ?? 0;
      if (pa !== pb) return pa - pb;
      return a.id.localeCompare(b.id);
    });
}

export function assignmentsOfBoard(state: State, boardId: BoardId): CardBoardAssignment[] {
  return Object.values(state.assignments)
    .filter((a) => a.boardId === boardId)
    .sort((a, b) => {
      if (a.columnId !== b.columnId) return (a.columnId ?? "").localeCompare(b.columnId ?? "");
      if (a.position !== b.position) return a.position - b.position;
      return a.cardId.localeCompare(b.cardId);
    });
}

export function assignmentsOfCard(state: State, cardId: CardId): CardBoardAssignment[] {
  return Object.values(state.assignments).filter((a) => a.cardId === cardId);
}

/** Board of the card's primary column, if it has one. */
export function primaryBoardId(state: State, card: Card): BoardId | undefined {
  if (card.columnId === null) return undefined;
  return state.columns[card.columnId]?.boardId;
}

/** Every board the card sits on: its column's board plus its placements. */
export function attachedBoardIds(state: State, card: Card): BoardId[] {
  const ids: BoardId[] = [];
  const primary = primaryBoardId(state, card);
  if (primary) ids.push(primary);
  for (const a of assignmentsOfCard(state, card.id)) {
    if (!ids.includes(a.boardId)) ids.push(a.boardId);
  }
  return ids;
}

export function attachedRoles(state: State, card: Card, userId: UserId): MaybeRole[] {
  return attachedBoardIds(state, card).map((boardId) => getBoardRole(state, boardId, userId));
}

export function tagsOfBoard(state: State, boardId: BoardId): Tag[] {
  return Object.values(state.tags)
    .filter((t) => t.scope.kind === "board" && t.scope.boardId === boardId)
    .sort((a, b) => a.name.localeCompare(b.name));
}

export function tagsOfUser(state: State, userId: UserId): Tag[] {
  return Object.values(state.tags)
    .filter((t) => t.scope.kind === "user" && t.scope.ownerId === userId)
    .sort((a, b) => a.name.localeCompare(b.name));
}

export function tagsOfCard(state: State, cardId: CardId): Tag[] {
  const ids: TagId[] = state.cardTags[cardId] ?? [];
  return ids
    .flatMap((id) => {
      const tag = state.tags[id];
      return tag ? [tag] : [];
    })
    .sort((a, b) => a.name.localeCompare(b.name));
}

export function unlinkTag(state: State, cardId: CardId, tagId: TagId): void {
  const ids = state.cardTags[cardId];
  if (!ids) return;
  const next = ids.filter((id) => id !== tagId);
  if (next.length > 0) state.cardTags[cardId] = next;
  else delete state.cardTags[cardId];
}
