import { nowIso, type BoardId, type CardId, type ColumnId } from "./ids";
import { assignmentKey, type State } from "./model";
import { NotFoundError, ValidationError } from "./errors";

export interface PositionEntry {
  id: string;
  position: number;
}

/**
 * Adapter between the generic reordering rules and one kind of ordered row.
 * Every method works on a transaction draft.
 */
export interface PositionTable<C> {
  readonly label: string;
  entries(state: State, container: C): PositionEntry[];
  write(state: State, id: string, container: C, position: number): void;
  /** Takes the item out of its container (deleting the row where the row is the placement). */
  detach(state: State, id: string): void;
  sameContainer(a: C, b: C): boolean;
}

function assertPosition(desired: number, max: number): void {
  if (!Number.isInteger(desired) || desired < 0 || desired > max) {
    throw new ValidationError(
      `Invalid position ${desired}: expected an integer between 0 and ${max}`,
    );
  }
}

function byPositionThenId(a: PositionEntry, b: PositionEntry): number {
  if (a.position !== b.position) return a.position - b.position;
  return a.id.localeCompare(b.id);
}

/**
 * Keeps positions within each container at exactly 0..n-1. Validation happens
 * before the first write, so a rejected call leaves the draft as it was.
 */
export class PositionStore<C> {
  constructor(private readonly table: PositionTable<C>) {}

  /** Ids of a container in position order. */
  ordered(state: State, container: C): string[] {
    return this.table
      .entries(state, container)
      .sort(byPositionThenId)
      .map((e) => e.id);
  }

  insert(state: State, container: C, id: string, desired?: number): number {
    const others = this.table.entries(state, container).filter((e) => e.id !== id);
    if (desired === undefined) {
      let max = -1;
      for (const e of others) if (e.position > max) max = e.position;
      this.table.write(state, id, container, max + 1);
      return max + 1;
    }

    assertPosition(desired, others.length);
    for (const e of others) {
      if (e.position >= desired) this.table.write(state, e.id, container, e.position + 1);
    }
    this.table.write(state, id, container, desired);
    return desired;
  }

  move(state: State, id: string, from: C, to: C, desired: number): number {
    const source = this.table.entries(state, from);
    const current = source.find((e) => e.id === id);
    if (!current) throw new NotFoundError(`${this.table.label} not found: ${id}`);

    if (this.table.sameContainer(from, to)) {
      assertPosition(desired, source.length);
      // One past the end means "to the end".
      const target = desired === source.length ? source.length - 1 : desired;
      if (target === current.position) return target;

      for (const e of source) {
        if (e.id === id) continue;
        if (target > current.position && e.position > current.position && e.position <= target) {
          this.table.write(state, e.id, from, e.position - 1);
        } else if (target < current.position && e.position >= target && e.position < current.position) {
          this.table.write(state, e.id, from, e.position + 1);
        }
      }
      this.table.write(state, id, from, target);
      return target;
    }

    const destination = this.table.entries(state, to).filter((e) => e.id !== id);
    assertPosition(desired, destination.length);

    for (const e of source) {
      if (e.position > current.position) this.table.write(state, e.id, from, e.position - 1);
    }
    for (const e of destination) {
      if (e.position >= desired) this.table.write(state, e.id, to, e.position + 1);
    }
    this.table.write(state, id, to, desired);
    return desired;
  }

  remove(state: State, container: C, id: string): void {
    const entries = this.table.entries(state, container);
    const current = entries.find((e) => e.id === id);
    if (!current) throw new NotFoundError(`${this.table.label} not found: ${id}`);
    for (const e of entries) {
      if (e.position > current.position) this.table.write(state, e.id, container, e.position - 1);
    }
    this.table.detach(state, id);
  }

  /** Renumbers a container to 0..n-1, keeping the existing order. */
  normalize(state: State, container: C): void {
    const entries = this.table.entries(state, container).sort(byPositionThenId);
    entries.forEach((e, idx) => {
      if (e.position !== idx) this.table.write(state, e.id, container, idx);
    });
  }
}

export const columnPositions = new PositionStore<BoardId>({
  label: "Column",
  entries(state, boardId) {
    return Object.values(state.columns)
      .filter((c) => c.boardId === boardId)
      .map((c) => ({ id: c.id, position: c.position }));
  },
  write(state, id, boardId, position) {
    const column = state.columns[id];
    if (!column) throw new NotFoundError(`Column not found: ${id}`);
    column.boardId = boardId;
    column.position = position;
  },
  detach(state, id) {
    delete state.columns[id];
  },
  sameContainer: (a, b) => a === b,
});

export const cardPositions = new PositionStore<ColumnId>({
  label: "Card",
  entries(state, columnId) {
    const out: PositionEntry[] = [];
    for (const card of Object.values(state.cards)) {
      if (card.columnId === columnId && card.position !== null) {
        out.push({ id: card.id, position: card.position });
      }
    }
    return out;
  },
  write(state, id, columnId, position) {
    const card = state.cards[id];
    if (!card) throw new NotFoundError(`Card not found: ${id}`);
    card.columnId = columnId;
    card.position = position;
  },
  detach(state, id) {
    const card = state.cards[id];
    if (!card) return;
    card.columnId = null;
    card.position = null;
  },
  sameContainer: (a, b) => a === b,
});

/** A board's placements bucket: one per column, plus one for placements with no column. */
export interface AssignmentBucket {
  boardId: BoardId;
  columnId: ColumnId | null;
}

/** Items are card ids; the board comes from the bucket. */
export function assignmentPositionsFor(boardId: BoardId): PositionStore<ColumnId | null> {
  return new PositionStore<ColumnId | null>({
    label: "Card placement",
    entries(state, columnId) {
      return Object.values(state.assignments)
        .filter((a) => a.boardId === boardId && a.columnId === columnId)
        .map((a) => ({ id: a.cardId, position: a.position }));
    },
    write(state, cardId: CardId, columnId, position) {
      const key = assignmentKey(cardId, boardId);
      const existing = state.assignments[key];
      if (existing) {
        existing.columnId = columnId;
        existing.position = position;
        return;
      }
      state.assignments[key] = { cardId, boardId, columnId, position, createdAt: nowIso() };
    },
    detach(state, cardId) {
      delete state.assignments[assignmentKey(cardId, boardId)];
    },
    sameContainer: (a, b) => a === b,
  });
}

/** Restores 0..n-1 numbering in every container, for snapshots written by older or foreign tools. */
export function repairPositions(state: State): void {
  for (const boardId of Object.keys(state.boards)) {
    columnPositions.normalize(state, boardId);
  }
  for (const columnId of Object.keys(state.columns)) {
    cardPositions.normalize(state, columnId);
  }
  const buckets = new Map<string, AssignmentBucket>();
  for (const a of Object.values(state.assignments)) {
    buckets.set(`${a.boardId}:${a.columnId ?? ""}`, { boardId: a.boardId, columnId: a.columnId });
  }
  for (const bucket of buckets.values()) {
    assignmentPositionsFor(bucket.boardId).normalize(state, bucket.columnId);
  }
}
