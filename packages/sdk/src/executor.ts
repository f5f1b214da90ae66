import type { BoardId, UserId } from "./ids";
import type { ActionOutcome, Board, State } from "./model";
import type { Store } from "./store";
import type { ActionDescriptor } from "./parser";
import {
  BOARD_ALIASES,
  GLOBAL_ONLY_KINDS,
  actionKind,
  decodeAction,
  isMutatingKind,
  pickParam,
  type MutatingAction,
} from "./actions";
import { canEdit } from "./access";
import { ForbiddenError, NotFoundError, ValidationError, isDomainError } from "./errors";
import { findBoardForUser, findBoardTag, findCard, findColumn, findUserTag } from "./resolver";
import { getBoardRole } from "./state";
import { createLogger } from "./logger";
import * as m from "./mutations";

const log = createLogger("executor");

export const NO_MODIFICATION = "No modification made";
export const GLOBAL_ONLY_MESSAGE = "This action is only available in global chat";

function outcome(action: string, description: string, success: boolean): ActionOutcome {
  return { action, description, success };
}

function requireChatEdit(state: State, board: Board, actorId: UserId): void {
  if (!canEdit(getBoardRole(state, board.id, actorId))) {
    throw new ForbiddenError(`You don't have permission to edit board '${board.name}'`);
  }
}

/** Applies one decoded action to a board the actor may edit; returns the success text. */
function applyOnBoard(state: State, actorId: UserId, board: Board, action: MutatingAction): string {
  switch (action.kind) {
    case "create_card": {
      const column = findColumn(state, board.id, action.column);
      if (!column) throw new NotFoundError(`Column '${action.column}' not found`);
      const card = m.createCard(state, {
        actorId,
        columnId: column.id,
        title: action.title,
        body: action.body,
        visibility: "restricted",
      });
      return `Created card '${card.title}' in column '${column.name}'`;
    }
    case "move_card": {
      const column = findColumn(state, board.id, action.column);
      if (!column) throw new NotFoundError(`Column '${action.column}' not found`);
      const card = findCard(state, board.id, action.card);
      if (!card) throw new NotFoundError(`Card '${action.card}' not found`);
      m.moveCard(state, { actorId, cardId: card.id, columnId: column.id, position: 0 });
      return `Moved '${card.title}' to '${column.name}'`;
    }
    case "create_tag": {
      const tag = m.createTag(state, {
        actorId,
        boardId: board.id,
        name: action.name,
        color: action.color,
      });
      return `Created tag '${tag.name}'`;
    }
    case "add_tag": {
      const tag =
        findBoardTag(state, board.id, action.tag) ?? findUserTag(state, actorId, action.tag);
      if (!tag) throw new NotFoundError(`Tag '${action.tag}' not found`);
      const card = findCard(state, board.id, action.card);
      if (!card) throw new NotFoundError(`Card '${action.card}' not found`);
      m.addTagToCard(state, { actorId, cardId: card.id, tagId: tag.id });
      return `Added tag '${tag.name}' to '${card.title}'`;
    }
    case "delete_column": {
      const column = findColumn(state, board.id, action.column);
      if (!column) throw new NotFoundError(`Column '${action.column}' not found`);
      m.deleteColumn(state, { actorId, columnId: column.id });
      return `Deleted column '${column.name}'`;
    }
    case "delete_tag": {
      const tag = findBoardTag(state, board.id, action.tag);
      if (!tag) throw new NotFoundError(`Tag '${action.tag}' not found`);
      m.deleteTag(state, { actorId, tagId: tag.id });
      return `Deleted tag '${tag.name}'`;
    }
    case "delete_card": {
      const card = findCard(state, board.id, action.card);
      if (!card) throw new NotFoundError(`Card '${action.card}' not found`);
      m.deleteCard(state, { actorId, cardId: card.id });
      return `Deleted card '${card.title}'`;
    }
    case "create_board":
    case "move_card_cross_board":
      throw new ValidationError(GLOBAL_ONLY_MESSAGE);
  }
}

function moveAcrossBoards(
  state: State,
  actorId: UserId,
  action: Extract<MutatingAction, { kind: "move_card_cross_board" }>,
): string {
  const from = findBoardForUser(state, actorId, action.fromBoard);
  if (!from) throw new NotFoundError(`Source board '${action.fromBoard}' not found`);
  const to = findBoardForUser(state, actorId, action.toBoard);
  if (!to) throw new NotFoundError(`Target board '${action.toBoard}' not found`);
  requireChatEdit(state, from, actorId);
  requireChatEdit(state, to, actorId);

  const card = findCard(state, from.id, action.card);
  if (!card) throw new NotFoundError(`Card '${action.card}' not found in board '${from.name}'`);
  const column = findColumn(state, to.id, action.column);
  if (!column) {
    throw new NotFoundError(`Column '${action.column}' not found in board '${to.name}'`);
  }
  m.moveCard(state, { actorId, cardId: card.id, columnId: column.id });
  return `Moved '${card.title}' from '${from.name}' to '${to.name}' (column '${column.name}')`;
}

function applyGlobalOnly(state: State, actorId: UserId, action: MutatingAction): string {
  switch (action.kind) {
    case "create_board": {
      const board = m.createBoard(state, {
        actorId,
        name: action.name,
        description: action.description,
      });
      return `Created board '${board.name}'`;
    }
    case "move_card_cross_board":
      return moveAcrossBoards(state, actorId, action);
    default:
      throw new ValidationError(`Action ${action.kind} needs a board`);
  }
}

/**
 * Runs `apply` on a copy of the batch draft and turns domain errors into a failed
 * outcome. The copy is merged back only on success, so a failed action leaves the
 * rest of the batch as it was; other errors propagate and abort the transaction.
 */
function attempt(draft: State, name: string, apply: (trial: State) => string): ActionOutcome {
  const trial = structuredClone(draft);
  try {
    const description = apply(trial);
    Object.assign(draft, trial);
    log.debug("action applied", { action: name, description });
    return outcome(name, description, true);
  } catch (err) {
    if (!isDomainError(err)) throw err;
    log.debug("action failed", { action: name, reason: err.message });
    return outcome(name, err.message, false);
  }
}

/** Applies one action of a conversation bound to `boardId` to a transaction draft. */
export function applyBoardAction(
  draft: State,
  args: { actorId: UserId; boardId: BoardId; descriptor: ActionDescriptor },
): ActionOutcome {
  const { actorId, boardId, descriptor } = args;
  const kind = actionKind(descriptor.action);
  if (kind === "unknown") {
    return outcome(descriptor.action, `Unknown action: ${descriptor.action}`, false);
  }
  if (!isMutatingKind(kind)) return outcome(kind, NO_MODIFICATION, true);
  if (GLOBAL_ONLY_KINDS.has(kind)) return outcome(kind, GLOBAL_ONLY_MESSAGE, false);

  return attempt(draft, kind, (trial) => {
    // Roles are read from the draft so a right revoked earlier in the batch applies at once.
    const { board } = m.requireBoardAccess(trial, boardId, actorId);
    requireChatEdit(trial, board, actorId);
    const decoded = decodeAction(kind, descriptor.params);
    if (!decoded.ok) throw new ValidationError(decoded.message);
    return applyOnBoard(trial, actorId, board, decoded.action);
  });
}

/** Applies one action of the user's cross-board conversation to a transaction draft. */
export function applyGlobalAction(
  draft: State,
  args: { actorId: UserId; descriptor: ActionDescriptor },
): ActionOutcome {
  const { actorId, descriptor } = args;
  const kind = actionKind(descriptor.action);
  if (kind === "unknown") {
    return outcome(descriptor.action, `Unknown action: ${descriptor.action}`, false);
  }
  if (!isMutatingKind(kind)) return outcome(kind, NO_MODIFICATION, true);

  if (GLOBAL_ONLY_KINDS.has(kind)) {
    const decoded = decodeAction(kind, descriptor.params);
    if (!decoded.ok) return outcome(kind, decoded.message, false);
    const action = decoded.action;
    return attempt(draft, kind, (trial) => applyGlobalOnly(trial, actorId, action));
  }

  const boardName = pickParam(descriptor.params, BOARD_ALIASES);
  if (!boardName) {
    return outcome(
      kind,
      `Missing board name. Please specify which board. Params: ${JSON.stringify(descriptor.params)}`,
      false,
    );
  }

  return attempt(draft, kind, (trial) => {
    const board = findBoardForUser(trial, actorId, boardName);
    if (!board) throw new NotFoundError(`Board '${boardName}' not found`);
    requireChatEdit(trial, board, actorId);
    const decoded = decodeAction(kind, descriptor.params);
    if (!decoded.ok) throw new ValidationError(decoded.message);
    return applyOnBoard(trial, actorId, board, decoded.action);
  });
}

/** Executes one board-chat action in its own transaction. */
export function executeBoardAction(args: {
  store: Store;
  actorId: UserId;
  boardId: BoardId;
  descriptor: ActionDescriptor;
}): Promise<ActionOutcome> {
  const { store, actorId, boardId, descriptor } = args;
  return store.transact((draft) => applyBoardAction(draft, { actorId, boardId, descriptor }));
}

/** Executes one global-chat action in its own transaction. */
export function executeGlobalAction(args: {
  store: Store;
  actorId: UserId;
  descriptor: ActionDescriptor;
}): Promise<ActionOutcome> {
  const { store, actorId, descriptor } = args;
  return store.transact((draft) => applyGlobalAction(draft, { actorId, descriptor }));
}
