import type { BoardId, UserId } from "./ids";
import type { ActionOutcome, ChatMessage, State } from "./model";
import type { Store } from "./store";
import type { ChatTurn, LanguageModel } from "./llm";
import { parseActions, extractReadableMessage, type ActionDescriptor } from "./parser";
import { isReadOnlyAction } from "./actions";
import { applyBoardAction, applyGlobalAction } from "./executor";
import { buildBoardPrompt, buildGlobalPrompt } from "./prompts";
import { InfrastructureError, ValidationError, errorMessage } from "./errors";
import { appendChatMessage, requireBoardAccess } from "./mutations";
import { createLogger } from "./logger";

const log = createLogger("chat");

/** The authenticated caller. `context` is free text the user keeps about themselves. */
export interface Actor {
  userId: UserId;
  context?: string;
}

export interface ChatReply {
  response: string;
  /** Outcomes of the mutating actions, in the order the model wrote them. */
  actionsTaken: ActionOutcome[];
  message: ChatMessage;
}

export interface ChatServiceOptions {
  store: Store;
  model: LanguageModel;
  timeoutMs: number;
}

async function withTimeout<T>(work: Promise<T>, timeoutMs: number, what: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${what} timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

function requireText(message: string): string {
  const text = message.trim();
  if (!text) throw new ValidationError("Message is required");
  return text;
}

/**
 * One chat turn: prompt the model, apply the actions it wrote in order, and keep
 * an audit record. A model failure aborts the turn before anything is applied; a
 * storage failure aborts it with nothing applied or recorded.
 */
export class ChatService {
  constructor(private readonly options: ChatServiceOptions) {}

  private async ask(system: string, message: string): Promise<string> {
    const turns: ChatTurn[] = [
      { role: "system", content: system },
      { role: "user", content: message },
    ];
    try {
      return await withTimeout(this.options.model.chat(turns), this.options.timeoutMs, "Model call");
    } catch (err) {
      if (err instanceof InfrastructureError) throw err;
      throw new InfrastructureError(`Model call failed: ${errorMessage(err)}`, err);
    }
  }

  /**
   * Applies the mutating actions to one draft and appends the audit record to it,
   * so the whole turn is committed by a single persist or not at all.
   */
  private async commitTurn(args: {
    boardId: BoardId | null;
    userId: UserId;
    text: string;
    response: string;
    descriptors: ActionDescriptor[];
    apply: (draft: State, descriptor: ActionDescriptor) => ActionOutcome;
  }): Promise<{ actionsTaken: ActionOutcome[]; message: ChatMessage }> {
    const result = await this.options.store.transact((draft) => {
      const actionsTaken: ActionOutcome[] = [];
      for (const descriptor of args.descriptors) {
        // Read-only actions are answered in the reply text and left out of the report.
        if (isReadOnlyAction(descriptor.action)) continue;
        actionsTaken.push(args.apply(draft, descriptor));
      }
      const message = appendChatMessage(draft, {
        boardId: args.boardId,
        userId: args.userId,
        message: args.text,
        response: args.response,
        actionsTaken: actionsTaken.length > 0 ? actionsTaken : null,
      });
      return { actionsTaken, message };
    });
    for (const taken of result.actionsTaken) {
      if (taken.success) log.info("action applied", { action: taken.action });
      else log.warn("action failed", { action: taken.action, reason: taken.description });
    }
    return result;
  }

  async sendBoardMessage(args: {
    actor: Actor;
    boardId: BoardId;
    message: string;
  }): Promise<ChatReply> {
    const { store } = this.options;
    const { actor, boardId } = args;
    const text = requireText(args.message);

    const system = await store.read((state) => {
      requireBoardAccess(state, boardId, actor.userId);
      return buildBoardPrompt(state, boardId, actor.context);
    });

    const raw = await this.ask(system, text);
    const descriptors = parseActions(raw);
    log.debug("parsed model reply", { boardId, actions: descriptors.length });

    const response = extractReadableMessage(raw, descriptors);
    const { actionsTaken, message } = await this.commitTurn({
      boardId,
      userId: actor.userId,
      text,
      response,
      descriptors,
      apply: (draft, descriptor) =>
        applyBoardAction(draft, { actorId: actor.userId, boardId, descriptor }),
    });
    return { response, actionsTaken, message };
  }

  async sendGlobalMessage(args: { actor: Actor; message: string }): Promise<ChatReply> {
    const { store } = this.options;
    const { actor } = args;
    const text = requireText(args.message);

    const system = await store.read((state) =>
      buildGlobalPrompt(state, actor.userId, actor.context),
    );

    const raw = await this.ask(system, text);
    const descriptors = parseActions(raw);
    log.debug("parsed model reply", { scope: "global", actions: descriptors.length });

    const response = extractReadableMessage(raw, descriptors);
    const { actionsTaken, message } = await this.commitTurn({
      boardId: null,
      userId: actor.userId,
      text,
      response,
      descriptors,
      apply: (draft, descriptor) => applyGlobalAction(draft, { actorId: actor.userId, descriptor }),
    });
    return { response, actionsTaken, message };
  }
}
