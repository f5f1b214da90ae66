import type { BoardId, CardId, UserId } from "./ids";
import type {
  BoardRole,
  Card,
  CardBoardAssignment,
  CardStatus,
  ChatMessage,
  Column,
  State,
  Tag,
} from "./model";
import type { Store } from "./store";
import { canViewCard } from "./access";
import { ForbiddenError, ValidationError } from "./errors";
import * as m from "./mutations";
import {
  assignmentsOfBoard,
  attachedRoles,
  boardsForUser,
  columnsOfBoard,
  tagsOfBoard,
  tagsOfCard,
  tagsOfUser,
  type BoardWithRole,
} from "./state";

export const CHAT_HISTORY_LIMIT = 50;

/** Wraps a draft mutation as a command running in its own transaction. */
function command<A, R>(mutation: (state: State, args: A) => R) {
  return (args: A & { store: Store }): Promise<R> =>
    args.store.transact((draft) => mutation(draft, args));
}

export const createBoard = command(m.createBoard);
export const updateBoard = command(m.updateBoard);
export const deleteBoard = command(m.deleteBoard);

export const addPermission = command(m.addPermission);
export const removePermission = command(m.removePermission);

export const createColumn = command(m.createColumn);
export const renameColumn = command(m.renameColumn);
export const moveColumn = command(m.moveColumn);
export const deleteColumn = command(m.deleteColumn);

export const createCard = command(m.createCard);
export const createStandaloneCard = command(m.createStandaloneCard);
export const updateCard = command(m.updateCard);
export const deleteCard = command(m.deleteCard);
export const moveCard = command(m.moveCard);

export const assignCardToBoard = command(m.assignCardToBoard);
export const removeCardFromBoard = command(m.removeCardFromBoard);
export const moveCardInBoard = command(m.moveCardInBoard);

export const createTag = command(m.createTag);
export const createUserTag = command(m.createUserTag);
export const updateTag = command(m.updateTag);
export const deleteTag = command(m.deleteTag);
export const addTagToCard = command(m.addTagToCard);
export const removeTagFromCard = command(m.removeTagFromCard);

export const clearChatHistory = command(m.clearChatHistory);
export const clearGlobalHistory = command(m.clearGlobalHistory);

// ---------------------------------------------------------------------------
// Reads

export async function getBoard(args: {
  store: Store;
  actorId: UserId;
  boardId: BoardId;
}): Promise<BoardWithRole> {
  return args.store.read((state) => m.requireBoardAccess(state, args.boardId, args.actorId));
}

export async function listBoardsForUser(args: {
  store: Store;
  userId: UserId;
}): Promise<BoardWithRole[]> {
  return args.store.read((state) => boardsForUser(state, args.userId));
}

export interface PermissionEntry {
  userId: UserId;
  role: BoardRole;
}

const ROLE_ORDER: Record<BoardRole, number> = { owner: 0, editor: 1, reader: 2 };

/** Owner first, then editors and readers, each by user id. */
export async function listPermissions(args: {
  store: Store;
  actorId: UserId;
  boardId: BoardId;
}): Promise<PermissionEntry[]> {
  return args.store.read((state) => {
    m.requireBoardAccess(state, args.boardId, args.actorId);
    return Object.entries(state.permissions[args.boardId] ?? {})
      .map(([userId, role]) => ({ userId, role }))
      .sort((a, b) => {
        if (a.role !== b.role) return ROLE_ORDER[a.role] - ROLE_ORDER[b.role];
        return a.userId.localeCompare(b.userId);
      });
  });
}

export async function listColumns(args: {
  store: Store;
  actorId: UserId;
  boardId: BoardId;
}): Promise<Column[]> {
  return args.store.read((state) => {
    m.requireBoardAccess(state, args.boardId, args.actorId);
    return columnsOfBoard(state, args.boardId);
  });
}

function requireVisibleCard(state: State, cardId: CardId, actorId: UserId): Card {
  const card = m.requireCard(state, cardId);
  if (!canViewCard(card, attachedRoles(state, card, actorId), actorId)) {
    throw new ForbiddenError(`Permission denied: actorId=${actorId} cardId=${cardId}`);
  }
  return card;
}

export async function getCard(args: {
  store: Store;
  actorId: UserId;
  cardId: CardId;
}): Promise<Card> {
  return args.store.read((state) => requireVisibleCard(state, args.cardId, args.actorId));
}

/** Cards the user owns that sit in no column, oldest first. */
export async function listInboxCards(args: {
  store: Store;
  actorId: UserId;
  status?: CardStatus;
}): Promise<Card[]> {
  return args.store.read((state) =>
    Object.values(state.cards)
      .filter((c) => c.ownerId === args.actorId && c.columnId === null)
      .filter((c) => args.status === undefined || c.status === args.status)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt)),
  );
}

export async function listAssignments(args: {
  store: Store;
  actorId: UserId;
  boardId: BoardId;
}): Promise<CardBoardAssignment[]> {
  return args.store.read((state) => {
    m.requireBoardAccess(state, args.boardId, args.actorId);
    return assignmentsOfBoard(state, args.boardId);
  });
}

export async function listBoardTags(args: {
  store: Store;
  actorId: UserId;
  boardId: BoardId;
}): Promise<Tag[]> {
  return args.store.read((state) => {
    m.requireBoardAccess(state, args.boardId, args.actorId);
    return tagsOfBoard(state, args.boardId);
  });
}

export async function listUserTags(args: { store: Store; actorId: UserId }): Promise<Tag[]> {
  return args.store.read((state) => tagsOfUser(state, args.actorId));
}

export async function listTagsForCard(args: {
  store: Store;
  actorId: UserId;
  cardId: CardId;
}): Promise<Tag[]> {
  return args.store.read((state) => {
    requireVisibleCard(state, args.cardId, args.actorId);
    return tagsOfCard(state, args.cardId);
  });
}

function latest(messages: ChatMessage[], limit: number): ChatMessage[] {
  if (!Number.isInteger(limit) || limit < 0) {
    throw new ValidationError(`Invalid limit: ${limit} (expected a non-negative integer)`);
  }
  return messages.slice(Math.max(0, messages.length - limit));
}

/** The latest messages of a board conversation, oldest first. */
export async function listChatHistory(args: {
  store: Store;
  actorId: UserId;
  boardId: BoardId;
  limit?: number;
}): Promise<ChatMessage[]> {
  return args.store.read((state) => {
    m.requireBoardAccess(state, args.boardId, args.actorId);
    const messages = state.chatMessages.filter((msg) => msg.boardId === args.boardId);
    return latest(messages, args.limit ?? CHAT_HISTORY_LIMIT);
  });
}

export async function listGlobalHistory(args: {
  store: Store;
  actorId: UserId;
  limit?: number;
}): Promise<ChatMessage[]> {
  return args.store.read((state) => {
    const messages = state.chatMessages.filter(
      (msg) => msg.boardId === null && msg.userId === args.actorId,
    );
    return latest(messages, args.limit ?? CHAT_HISTORY_LIMIT);
  });
}
