import { createEmptyState, type State } from "./model";

/**
 * Transactional access to the board state.
 *
 * Transactions run one at a time against a private copy of the state; the copy
 * replaces the committed state only after `fn` returns and the snapshot has been
 * persisted. A throw anywhere discards the copy.
 */
export interface Store {
  read<T>(fn: (state: State) => T): Promise<T>;
  transact<T>(fn: (draft: State) => T): Promise<T>;
}

export class MemoryStore implements Store {
  private state: State;
  private tail: Promise<void> = Promise.resolve();

  constructor(initial: State = createEmptyState()) {
    this.state = structuredClone(initial);
  }

  read<T>(fn: (state: State) => T): Promise<T> {
    return this.enqueue(async () => structuredClone(fn(this.state)));
  }

  transact<T>(fn: (draft: State) => T): Promise<T> {
    return this.enqueue(async () => {
      const draft = structuredClone(this.state);
      const result = fn(draft);
      await this.persist(draft);
      this.state = draft;
      return structuredClone(result);
    });
  }

  /** Called with the next state before it is committed; a rejection aborts the commit. */
  protected async persist(_next: State): Promise<void> {}

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    // The queue only tracks completion; callers observe failures through `run`.
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
