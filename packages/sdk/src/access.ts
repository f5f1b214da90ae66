import type { UserId } from "./ids";
import type { BoardRole, Card, Tag } from "./model";

/**
 * Authorization rules. Every function is pure: callers look the roles up and pass
 * them in, so the same rules serve commands, search and chat actions.
 *
 * `attachedRoles` holds the viewer's role on each board the card sits on (its
 * primary column's board plus every placement), `undefined` where the viewer has
 * none. An empty list means the card is on no board.
 */

export type MaybeRole = BoardRole | undefined;

export function canView(role: MaybeRole): boolean {
  return role !== undefined;
}

export function canEdit(role: MaybeRole): boolean {
  return role === "owner" || role === "editor";
}

export function canDeleteBoard(role: MaybeRole): boolean {
  return role === "owner";
}

export function canManagePermissions(role: MaybeRole): boolean {
  return role === "owner";
}

/** A board has exactly one owner, so owner is never handed out. */
export function canGrantRole(role: BoardRole): boolean {
  return role !== "owner";
}

function isOwnerOrCreator(card: Card, viewerId: UserId): boolean {
  return card.ownerId === viewerId || card.createdBy === viewerId;
}

export function canViewCard(
  card: Card,
  attachedRoles: readonly MaybeRole[],
  viewerId: UserId,
): boolean {
  if (isOwnerOrCreator(card, viewerId)) return true;
  // Cards on no board are visible to their owner and creator only, whatever the tier.
  if (attachedRoles.length === 0) return false;
  switch (card.visibility) {
    case "private":
      return attachedRoles.some(canEdit);
    case "restricted":
      return attachedRoles.some(canView);
    case "public":
      return true;
  }
}

export function canEditCard(
  card: Card,
  attachedRoles: readonly MaybeRole[],
  viewerId: UserId,
): boolean {
  if (isOwnerOrCreator(card, viewerId)) return true;
  return attachedRoles.some(canEdit);
}

/** Board tags follow the board's edit right; user tags belong to their owner alone. */
export function canManageTag(tag: Tag, boardRole: MaybeRole, actorId: UserId): boolean {
  if (tag.scope.kind === "board") return canEdit(boardRole);
  return tag.scope.ownerId === actorId;
}
