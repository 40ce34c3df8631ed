import type { AllowlistEntry, ChatMessage, Interaction } from "./message.types";
import { authorName, shortTimestamp } from "./message.utils";

export function parseAllowlist(value: string | undefined): AllowlistEntry[] {
  if (!value) {
    return [];
  }

  const entries = new Map<string, AllowlistEntry>();
  for (const pair of value.split(",")) {
    const trimmed = pair.trim();
    const separator = trimmed.indexOf(":");
    if (separator <= 0) {
      continue;
    }
    const id = trimmed.slice(0, separator).trim();
    const label = trimmed.slice(separator + 1).trim();
    if (id) {
      entries.set(id, { id, label });
    }
  }
  return [...entries.values()];
}

export function isAllowed(allowlist: AllowlistEntry[], authorId: string): boolean {
  return allowlist.length === 0 || allowlist.some((entry) => entry.id === authorId);
}

export function filterAllowed(messages: ChatMessage[], allowlist: AllowlistEntry[]): ChatMessage[] {
  return messages.filter((message) => isAllowed(allowlist, message.author.id));
}

export function labelFor(allowlist: AllowlistEntry[], message: ChatMessage): string {
  const entry = allowlist.find((candidate) => candidate.id === message.author.id);
  return entry?.label || authorName(message.author);
}

export function toInteraction(allowlist: AllowlistEntry[], message: ChatMessage): Interaction {
  return {
    id: message.id,
    author: labelFor(allowlist, message),
    authorId: message.author.id,
    content: message.content,
    timestamp: shortTimestamp(message.createdAt),
  };
}
