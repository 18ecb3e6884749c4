import { randomUUID } from "node:crypto";

export function generateId(): string {
  return randomUUID();
}

export function generateCallId(prefix = "call"): string {
  return `${prefix}_${randomUUID().replace(/-/g, "").slice(0, 24)}`;
}
