import crypto from "node:crypto";

export type BoardId = string;
export type ColumnId = string;
export type CardId = string;
export type TagId = string;
export type UserId = string;
export type ChatMessageId = string;

export function newId(): string {
  if (typeof crypto.randomUUID === "function") return crypto.randomUUID();
  return crypto.randomBytes(16).toString("hex");
}

export function nowIso(): string {
  return new Date().toISOString();
}
