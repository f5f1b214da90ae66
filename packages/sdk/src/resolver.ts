import type { BoardId, UserId } from "./ids";
import type { Board, Card, Column, State, Tag } from "./model";
import { boardsForUser, cardsInColumn, columnsOfBoard, tagsOfBoard, tagsOfUser } from "./state";

/**
 * Name lookups for chat actions. Matching is exact after lower-casing; the
 * query is trimmed, stored names are not. The first match in display order wins
 * and nothing is matched approximately.
 */

function sameName(stored: string, query: string): boolean {
  return stored.toLowerCase() === query.trim().toLowerCase();
}

export function findColumn(state: State, boardId: BoardId, name: string): Column | undefined {
  return columnsOfBoard(state, boardId).find((c) => sameName(c.name, name));
}

/** Searches columns left to right, each top to bottom. */
export function findCard(state: State, boardId: BoardId, title: string): Card | undefined {
  for (const column of columnsOfBoard(state, boardId)) {
    const card = cardsInColumn(state, column.id).find((c) => sameName(c.title, title));
    if (card) return card;
  }
  return undefined;
}

export function findBoardTag(state: State, boardId: BoardId, name: string): Tag | undefined {
  return tagsOfBoard(state, boardId).find((t) => sameName(t.name, name));
}

export function findUserTag(state: State, ownerId: UserId, name: string): Tag | undefined {
  return tagsOfUser(state, ownerId).find((t) => sameName(t.name, name));
}

/** Among the boards the user holds a role on, oldest first. */
export function findBoardForUser(state: State, userId: UserId, name: string): Board | undefined {
  return boardsForUser(state, userId).find(({ board }) => sameName(board.name, name))?.board;
}
