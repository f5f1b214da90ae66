import { newId, nowIso, type BoardId, type CardId, type ColumnId, type TagId, type UserId } from "./ids";
import {
  DEFAULT_TAG_COLOR,
  assignmentKey,
  type ActionOutcome,
  type Board,
  type BoardRole,
  type Card,
  type CardStatus,
  type CardVisibility,
  type ChatMessage,
  type Column,
  type State,
  type Tag,
} from "./model";
import {
  canDeleteBoard,
  canEdit,
  canEditCard,
  canGrantRole,
  canManagePermissions,
  canManageTag,
} from "./access";
import { ForbiddenError, NotFoundError, ValidationError } from "./errors";
import { assignmentPositionsFor, cardPositions, columnPositions } from "./positions";
import {
  assignmentsOfCard,
  attachedBoardIds,
  attachedRoles,
  cardsInColumn,
  getBoardRole,
  primaryBoardId,
  unlinkTag,
} from "./state";

/**
 * State changes, each applied to a transaction draft. Every function checks its
 * own permissions and validates before its first write; a throw rolls the whole
 * transaction back.
 */

// ---------------------------------------------------------------------------
// Guards

export function requireBoardAccess(
  state: State,
  boardId: BoardId,
  actorId: UserId,
): { board: Board; role: BoardRole } {
  const board = state.boards[boardId];
  const role = getBoardRole(state, boardId, actorId);
  // A board the actor holds no role on is reported the same way as a missing one.
  if (!board || role === undefined) {
    throw new ForbiddenError(`Board not found or access denied: ${boardId}`);
  }
  return { board, role };
}

export function requireBoardEdit(state: State, boardId: BoardId, actorId: UserId): Board {
  const { board, role } = requireBoardAccess(state, boardId, actorId);
  if (!canEdit(role)) {
    throw new ForbiddenError(`Permission denied: actorId=${actorId} role=${role} boardId=${boardId}`);
  }
  return board;
}

export function requireColumn(state: State, columnId: ColumnId): Column {
  const column = state.columns[columnId];
  if (!column) throw new NotFoundError(`Column not found: ${columnId}`);
  return column;
}

export function requireCard(state: State, cardId: CardId): Card {
  const card = state.cards[cardId];
  if (!card) throw new NotFoundError(`Card not found: ${cardId}`);
  return card;
}

export function requireTag(state: State, tagId: TagId): Tag {
  const tag = state.tags[tagId];
  if (!tag) throw new NotFoundError(`Tag not found: ${tagId}`);
  return tag;
}

function requireCardEdit(state: State, card: Card, actorId: UserId): void {
  if (!canEditCard(card, attachedRoles(state, card, actorId), actorId)) {
    throw new ForbiddenError(`Permission denied: actorId=${actorId} cardId=${card.id}`);
  }
}

function requireName(raw: string, what: string): string {
  const name = raw.trim();
  if (!name) throw new ValidationError(`${what} is required`);
  return name;
}

const DATE_RE = /^\d{4}-\d{2}-\d{2}$/;

function normalizeDate(raw: string | null, field: string): string | null {
  if (raw === null) return null;
  const value = raw.trim();
  if (!value) return null;
  if (!DATE_RE.test(value) || Number.isNaN(Date.parse(`${value}T00:00:00Z`))) {
    throw new ValidationError(`Invalid ${field}: ${raw} (expected YYYY-MM-DD)`);
  }
  return value;
}

function normalizeBody(raw: string | null | undefined): string | null {
  if (raw === undefined || raw === null) return null;
  return raw.trim() ? raw : null;
}

/** Drops links to board tags whose board the card no longer sits on. */
function dropStaleBoardTags(state: State, card: Card): void {
  const boards = attachedBoardIds(state, card);
  for (const tagId of state.cardTags[card.id] ?? []) {
    const tag = state.tags[tagId];
    if (tag && tag.scope.kind === "board" && !boards.includes(tag.scope.boardId)) {
      unlinkTag(state, card.id, tagId);
    }
  }
}

function deleteCardRow(state: State, cardId: CardId): void {
  delete state.cards[cardId];
  delete state.cardTags[cardId];
}

// ---------------------------------------------------------------------------
// Boards

export function createBoard(
  state: State,
  args: { actorId: UserId; name: string; description?: string | null },
): Board {
  const name = requireName(args.name, "Board name");
  const ts = nowIso();
  const board: Board = {
    id: newId(),
    name,
    description: normalizeBody(args.description),
    ownerId: args.actorId,
    createdAt: ts,
    updatedAt: ts,
  };
  state.boards[board.id] = board;
  state.permissions[board.id] = { [args.actorId]: "owner" };
  return board;
}

export function updateBoard(
  state: State,
  args: { actorId: UserId; boardId: BoardId; name?: string; description?: string | null },
): Board {
  const board = requireBoardEdit(state, args.boardId, args.actorId);
  if (args.name !== undefined) board.name = requireName(args.name, "Board name");
  if (args.description !== undefined) board.description = normalizeBody(args.description);
  board.updatedAt = nowIso();
  return board;
}

/** Removes the column's cards, keeping those still placed on another board. */
function clearColumn(state: State, column: Column): void {
  for (const card of cardsInColumn(state, column.id)) {
    if (assignmentsOfCard(state, card.id).length === 0) {
      deleteCardRow(state, card.id);
      continue;
    }
    card.columnId = null;
    card.position = null;
    card.updatedAt = nowIso();
    dropStaleBoardTags(state, card);
  }
}

export function deleteBoard(state: State, args: { actorId: UserId; boardId: BoardId }): void {
  const { role } = requireBoardAccess(state, args.boardId, args.actorId);
  if (!canDeleteBoard(role)) {
    throw new ForbiddenError(`Only the owner can delete board ${args.boardId}`);
  }

  for (const [key, a] of Object.entries(state.assignments)) {
    if (a.boardId === args.boardId) delete state.assignments[key];
  }
  for (const column of Object.values(state.columns)) {
    if (column.boardId !== args.boardId) continue;
    clearColumn(state, column);
    delete state.columns[column.id];
  }
  for (const tag of Object.values(state.tags)) {
    if (tag.scope.kind !== "board" || tag.scope.boardId !== args.boardId) continue;
    for (const cardId of Object.keys(state.cardTags)) unlinkTag(state, cardId, tag.id);
    delete state.tags[tag.id];
  }
  state.chatMessages = state.chatMessages.filter((m) => m.boardId !== args.boardId);
  delete state.permissions[args.boardId];
  delete state.boards[args.boardId];
}

// ---------------------------------------------------------------------------
// Permissions

export function addPermission(
  state: State,
  args: { actorId: UserId; boardId: BoardId; userId: UserId; role: BoardRole },
): BoardRole {
  const { board, role } = requireBoardAccess(state, args.boardId, args.actorId);
  if (!canManagePermissions(role)) {
    throw new ForbiddenError(`Only the owner can manage permissions on board ${args.boardId}`);
  }
  if (!canGrantRole(args.role)) throw new ValidationError("The owner role cannot be granted");
  const current = getBoardRole(state, args.boardId, args.userId);
  if (current === "owner" || args.userId === board.ownerId) {
    throw new ValidationError("Cannot change the owner's permission");
  }
  const perms = state.permissions[args.boardId] ?? {};
  perms[args.userId] = args.role;
  state.permissions[args.boardId] = perms;
  return args.role;
}

export function removePermission(
  state: State,
  args: { actorId: UserId; boardId: BoardId; userId: UserId },
): void {
  const { role } = requireBoardAccess(state, args.boardId, args.actorId);
  if (!canManagePermissions(role)) {
    throw new ForbiddenError(`Only the owner can manage permissions on board ${args.boardId}`);
  }
  const perms = state.permissions[args.boardId];
  const current = perms?.[args.userId];
  if (!perms || current === undefined || current === "owner") {
    throw new ValidationError("Cannot remove owner permission or permission not found");
  }
  delete perms[args.userId];
}

// ---------------------------------------------------------------------------
// Columns

export function createColumn(
  state: State,
  args: { actorId: UserId; boardId: BoardId; name: string; position?: number },
): Column {
  requireBoardEdit(state, args.boardId, args.actorId);
  const name = requireName(args.name, "Column name");
  const ts = nowIso();
  const column: Column = {
    id: newId(),
    boardId: args.boardId,
    name,
    position: -1,
    createdAt: ts,
    updatedAt: ts,
  };
  state.columns[column.id] = column;
  columnPositions.insert(state, args.boardId, column.id, args.position);
  return column;
}

export function renameColumn(
  state: State,
  args: { actorId: UserId; columnId: ColumnId; name: string },
): Column {
  const column = requireColumn(state, args.columnId);
  requireBoardEdit(state, column.boardId, args.actorId);
  column.name = requireName(args.name, "Column name");
  column.updatedAt = nowIso();
  return column;
}

export function moveColumn(
  state: State,
  args: { actorId: UserId; columnId: ColumnId; position: number },
): number {
  const column = requireColumn(state, args.columnId);
  requireBoardEdit(state, column.boardId, args.actorId);
  const position = columnPositions.move(
    state,
    column.id,
    column.boardId,
    column.boardId,
    args.position,
  );
  column.updatedAt = nowIso();
  return position;
}

export function deleteColumn(state: State, args: { actorId: UserId; columnId: ColumnId }): void {
  const column = requireColumn(state, args.columnId);
  requireBoardEdit(state, column.boardId, args.actorId);

  const placements = assignmentPositionsFor(column.boardId);
  const moved = placements.ordered(state, column.id);
  for (const cardId of moved) {
    const end = placements.ordered(state, null).length;
    placements.move(state, cardId, column.id, null, end);
  }

  clearColumn(state, column);
  columnPositions.remove(state, column.boardId, column.id);
}

// ---------------------------------------------------------------------------
// Cards

export interface CardFields {
  body?: string | null;
  visibility?: CardVisibility;
  status?: CardStatus;
  startDate?: string | null;
  endDate?: string | null;
  dueDate?: string | null;
}

function newCard(
  args: CardFields & { title: string; createdBy: UserId; ownerId: UserId | null },
  defaultVisibility: CardVisibility,
): Card {
  const ts = nowIso();
  return {
    id: newId(),
    columnId: null,
    position: null,
    title: requireName(args.title, "Card title"),
    body: normalizeBody(args.body),
    visibility: args.visibility ?? defaultVisibility,
    status: args.status ?? "open",
    ownerId: args.ownerId,
    createdBy: args.createdBy,
    startDate: normalizeDate(args.startDate ?? null, "startDate"),
    endDate: normalizeDate(args.endDate ?? null, "endDate"),
    dueDate: normalizeDate(args.dueDate ?? null, "dueDate"),
    createdAt: ts,
    updatedAt: ts,
  };
}

export function createCard(
  state: State,
  args: CardFields & { actorId: UserId; columnId: ColumnId; title: string; position?: number },
): Card {
  const column = requireColumn(state, args.columnId);
  requireBoardEdit(state, column.boardId, args.actorId);
  const card = newCard({ ...args, createdBy: args.actorId, ownerId: null }, "restricted");
  state.cards[card.id] = card;
  cardPositions.insert(state, column.id, card.id, args.position);
  return card;
}

/** A card on no board, owned by its creator. */
export function createStandaloneCard(
  state: State,
  args: CardFields & { actorId: UserId; title: string },
): Card {
  const card = newCard({ ...args, createdBy: args.actorId, ownerId: args.actorId }, "private");
  state.cards[card.id] = card;
  return card;
}

export function updateCard(
  state: State,
  args: CardFields & { actorId: UserId; cardId: CardId; title?: string },
): Card {
  const card = requireCard(state, args.cardId);
  requireCardEdit(state, card, args.actorId);
  if (args.title !== undefined) card.title = requireName(args.title, "Card title");
  if (args.body !== undefined) card.body = normalizeBody(args.body);
  if (args.visibility !== undefined) card.visibility = args.visibility;
  if (args.status !== undefined) card.status = args.status;
  if (args.startDate !== undefined) card.startDate = normalizeDate(args.startDate, "startDate");
  if (args.endDate !== undefined) card.endDate = normalizeDate(args.endDate, "endDate");
  if (args.dueDate !== undefined) card.dueDate = normalizeDate(args.dueDate, "dueDate");
  card.updatedAt = nowIso();
  return card;
}

export function deleteCard(state: State, args: { actorId: UserId; cardId: CardId }): void {
  const card = requireCard(state, args.cardId);
  requireCardEdit(state, card, args.actorId);
  if (card.columnId !== null) cardPositions.remove(state, card.columnId, card.id);
  for (const a of assignmentsOfCard(state, card.id)) {
    assignmentPositionsFor(a.boardId).remove(state, a.columnId, card.id);
  }
  deleteCardRow(state, card.id);
}

/**
 * Moves a card into a column, within its board or onto another one. Without a
 * position the card goes to the end of the target column.
 */
export function moveCard(
  state: State,
  args: { actorId: UserId; cardId: CardId; columnId: ColumnId; position?: number },
): Card {
  const card = requireCard(state, args.cardId);
  const target = requireColumn(state, args.columnId);
  requireCardEdit(state, card, args.actorId);
  const sourceBoardId = primaryBoardId(state, card);
  if (sourceBoardId !== undefined) requireBoardEdit(state, sourceBoardId, args.actorId);
  requireBoardEdit(state, target.boardId, args.actorId);

  const sameColumn = card.columnId === target.id;
  const size = cardPositions.ordered(state, target.id).length;
  const end = sameColumn ? size - 1 : size;
  const position = args.position ?? end;

  if (sourceBoardId !== target.boardId) {
    // Validate before the placement on the target board is dropped.
    if (!Number.isInteger(position) || position < 0 || position > size) {
      throw new ValidationError(`Invalid position ${position}: expected an integer between 0 and ${size}`);
    }
    const placement = state.assignments[assignmentKey(card.id, target.boardId)];
    if (placement) {
      assignmentPositionsFor(target.boardId).remove(state, placement.columnId, card.id);
    }
  }

  if (card.columnId === null) {
    cardPositions.insert(state, target.id, card.id, position);
  } else {
    cardPositions.move(state, card.id, card.columnId, target.id, position);
  }
  card.updatedAt = nowIso();
  dropStaleBoardTags(state, card);
  return card;
}

// ---------------------------------------------------------------------------
// Placements on further boards

export function assignCardToBoard(
  state: State,
  args: {
    actorId: UserId;
    cardId: CardId;
    boardId: BoardId;
    columnId?: ColumnId | null;
    position?: number;
  },
): void {
  const card = requireCard(state, args.cardId);
  requireBoardEdit(state, args.boardId, args.actorId);
  requireCardEdit(state, card, args.actorId);
  const columnId = args.columnId ?? null;
  if (columnId !== null && requireColumn(state, columnId).boardId !== args.boardId) {
    throw new ValidationError(`Column ${columnId} does not belong to board ${args.boardId}`);
  }
  if (attachedBoardIds(state, card).includes(args.boardId)) {
    throw new ValidationError(`Card ${card.id} is already on board ${args.boardId}`);
  }
  assignmentPositionsFor(args.boardId).insert(state, columnId, card.id, args.position);
}

export function removeCardFromBoard(
  state: State,
  args: { actorId: UserId; cardId: CardId; boardId: BoardId },
): void {
  const card = requireCard(state, args.cardId);
  requireBoardEdit(state, args.boardId, args.actorId);
  const placement = state.assignments[assignmentKey(card.id, args.boardId)];
  if (!placement) {
    throw new NotFoundError(`Card ${card.id} is not placed on board ${args.boardId}`);
  }
  assignmentPositionsFor(args.boardId).remove(state, placement.columnId, card.id);
  dropStaleBoardTags(state, card);
}

export function moveCardInBoard(
  state: State,
  args: {
    actorId: UserId;
    cardId: CardId;
    boardId: BoardId;
    columnId: ColumnId | null;
    position: number;
  },
): number {
  requireBoardEdit(state, args.boardId, args.actorId);
  const placement = state.assignments[assignmentKey(args.cardId, args.boardId)];
  if (!placement) {
    throw new NotFoundError(`Card ${args.cardId} is not placed on board ${args.boardId}`);
  }
  if (args.columnId !== null && requireColumn(state, args.columnId).boardId !== args.boardId) {
    throw new ValidationError(`Column ${args.columnId} does not belong to board ${args.boardId}`);
  }
  return assignmentPositionsFor(args.boardId).move(
    state,
    args.cardId,
    placement.columnId,
    args.columnId,
    args.position,
  );
}

// ---------------------------------------------------------------------------
// Tags

function tagColor(raw: string | undefined): string {
  const color = raw?.trim();
  return color ? color : DEFAULT_TAG_COLOR;
}

export function createTag(
  state: State,
  args: { actorId: UserId; boardId: BoardId; name: string; color?: string },
): Tag {
  requireBoardEdit(state, args.boardId, args.actorId);
  const tag: Tag = {
    id: newId(),
    name: requireName(args.name, "Tag name"),
    color: tagColor(args.color),
    scope: { kind: "board", boardId: args.boardId },
    createdAt: nowIso(),
  };
  state.tags[tag.id] = tag;
  return tag;
}

/** A tag owned by a user, usable on any card they can edit. */
export function createUserTag(
  state: State,
  args: { actorId: UserId; name: string; color?: string },
): Tag {
  const tag: Tag = {
    id: newId(),
    name: requireName(args.name, "Tag name"),
    color: tagColor(args.color),
    scope: { kind: "user", ownerId: args.actorId },
    createdAt: nowIso(),
  };
  state.tags[tag.id] = tag;
  return tag;
}

function requireTagManage(state: State, tag: Tag, actorId: UserId): void {
  const role = tag.scope.kind === "board" ? getBoardRole(state, tag.scope.boardId, actorId) : undefined;
  if (!canManageTag(tag, role, actorId)) {
    throw new ForbiddenError(`Permission denied: actorId=${actorId} tagId=${tag.id}`);
  }
}

export function updateTag(
  state: State,
  args: { actorId: UserId; tagId: TagId; name?: string; color?: string },
): Tag {
  const tag = requireTag(state, args.tagId);
  requireTagManage(state, tag, args.actorId);
  if (args.name !== undefined) tag.name = requireName(args.name, "Tag name");
  if (args.color !== undefined) tag.color = tagColor(args.color);
  return tag;
}

export function deleteTag(state: State, args: { actorId: UserId; tagId: TagId }): void {
  const tag = requireTag(state, args.tagId);
  requireTagManage(state, tag, args.actorId);
  for (const cardId of Object.keys(state.cardTags)) unlinkTag(state, cardId, tag.id);
  delete state.tags[tag.id];
}

function requireTagOnCard(state: State, card: Card, tag: Tag, actorId: UserId): void {
  if (tag.scope.kind === "board") {
    if (!attachedBoardIds(state, card).includes(tag.scope.boardId)) {
      throw new ValidationError(`Tag ${tag.id} belongs to a board card ${card.id} is not on`);
    }
    requireBoardEdit(state, tag.scope.boardId, actorId);
    return;
  }
  if (tag.scope.ownerId !== actorId) {
    throw new ForbiddenError(`Permission denied: actorId=${actorId} tagId=${tag.id}`);
  }
  requireCardEdit(state, card, actorId);
}

export function addTagToCard(
  state: State,
  args: { actorId: UserId; cardId: CardId; tagId: TagId },
): void {
  const card = requireCard(state, args.cardId);
  const tag = requireTag(state, args.tagId);
  requireTagOnCard(state, card, tag, args.actorId);
  const ids = state.cardTags[card.id] ?? [];
  if (!ids.includes(tag.id)) state.cardTags[card.id] = [...ids, tag.id];
}

export function removeTagFromCard(
  state: State,
  args: { actorId: UserId; cardId: CardId; tagId: TagId },
): void {
  const card = requireCard(state, args.cardId);
  const tag = requireTag(state, args.tagId);
  requireTagOnCard(state, card, tag, args.actorId);
  unlinkTag(state, card.id, tag.id);
}

// ---------------------------------------------------------------------------
// Chat history

export function appendChatMessage(
  state: State,
  args: {
    boardId: BoardId | null;
    userId: UserId;
    message: string;
    response: string;
    actionsTaken: ActionOutcome[] | null;
  },
): ChatMessage {
  const entry: ChatMessage = {
    id: newId(),
    boardId: args.boardId,
    userId: args.userId,
    message: args.message,
    response: args.response,
    actionsTaken: args.actionsTaken,
    createdAt: nowIso(),
  };
  state.chatMessages.push(entry);
  return entry;
}

export function clearChatHistory(state: State, args: { actorId: UserId; boardId: BoardId }): number {
  requireBoardEdit(state, args.boardId, args.actorId);
  const before = state.chatMessages.length;
  state.chatMessages = state.chatMessages.filter((m) => m.boardId !== args.boardId);
  return before - state.chatMessages.length;
}

export function clearGlobalHistory(state: State, args: { actorId: UserId }): number {
  const before = state.chatMessages.length;
  state.chatMessages = state.chatMessages.filter(
    (m) => !(m.boardId === null && m.userId === args.actorId),
  );
  return before - state.chatMessages.length;
}
