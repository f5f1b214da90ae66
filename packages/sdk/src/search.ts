import type { BoardId, ColumnId, TagId, UserId } from "./ids";
import type { Card, State } from "./model";
import type { Store } from "./store";
import { canViewCard } from "./access";
import { requireBoardAccess } from "./mutations";
import { assignmentsOfBoard, attachedRoles, cardsInColumn, columnsOfBoard } from "./state";

export interface CardFilter {
  /** Words that must all appear in the title or body, case-insensitive. */
  query?: string;
  /** Card must carry at least one of these tags. */
  tagIds?: TagId[];
  startDateFrom?: string;
  startDateTo?: string;
  endDateFrom?: string;
  endDateTo?: string;
  dueDateFrom?: string;
  dueDateTo?: string;
  updatedFrom?: string;
  updatedTo?: string;
}

export interface BoardCardEntry {
  card: Card;
  /** Column the card shows in on this board; `null` for placements with no column. */
  columnId: ColumnId | null;
  /** `true` when the card is on this board through a placement rather than its column. */
  placed: boolean;
}

function normalizeQuery(query: string): string[] {
  return query.trim().toLowerCase().split(/\s+/).filter(Boolean);
}

function inRange(value: string | null, from?: string, to?: string): boolean {
  if (from === undefined && to === undefined) return true;
  // A range filter excludes cards with no date at all.
  if (value === null) return false;
  if (from !== undefined && value < from) return false;
  if (to !== undefined && value > to) return false;
  return true;
}

function matches(state: State, card: Card, filter: CardFilter): boolean {
  const needles = normalizeQuery(filter.query ?? "");
  if (needles.length > 0) {
    const hay = [card.title, card.body ?? ""].join("\n").toLowerCase();
    if (!needles.every((n) => hay.includes(n))) return false;
  }
  if (filter.tagIds && filter.tagIds.length > 0) {
    const ids = state.cardTags[card.id] ?? [];
    if (!filter.tagIds.some((id) => ids.includes(id))) return false;
  }
  return (
    inRange(card.startDate, filter.startDateFrom, filter.startDateTo) &&
    inRange(card.endDate, filter.endDateFrom, filter.endDateTo) &&
    inRange(card.dueDate, filter.dueDateFrom, filter.dueDateTo) &&
    inRange(card.updatedAt.slice(0, 10), filter.updatedFrom, filter.updatedTo)
  );
}

/**
 * Cards shown on a board for one viewer: each column's own cards, then the cards
 * placed in that column, columns in order, then placed cards with no column.
 */
export function boardCards(
  state: State,
  boardId: BoardId,
  viewerId: UserId,
  filter: CardFilter = {},
): BoardCardEntry[] {
  const placements = assignmentsOfBoard(state, boardId);
  const out: BoardCardEntry[] = [];

  const push = (card: Card, columnId: ColumnId | null, placed: boolean) => {
    if (!canViewCard(card, attachedRoles(state, card, viewerId), viewerId)) return;
    if (!matches(state, card, filter)) return;
    out.push({ card, columnId, placed });
  };

  for (const column of columnsOfBoard(state, boardId)) {
    for (const card of cardsInColumn(state, column.id)) push(card, column.id, false);
    for (const a of placements) {
      const card = state.cards[a.cardId];
      if (card && a.columnId === column.id) push(card, column.id, true);
    }
  }
  for (const a of placements) {
    const card = state.cards[a.cardId];
    if (card && a.columnId === null) push(card, null, true);
  }
  return out;
}

export async function listBoardCards(args: {
  store: Store;
  actorId: UserId;
  boardId: BoardId;
  filter?: CardFilter;
}): Promise<BoardCardEntry[]> {
  return args.store.read((state) => {
    requireBoardAccess(state, args.boardId, args.actorId);
    return boardCards(state, args.boardId, args.actorId, args.filter);
  });
}
