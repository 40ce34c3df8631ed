import type { AllowlistEntry, ChatMessage, Interaction } from "../core/domain/message.types";
import { formatMessageLine } from "../core/domain/message.utils";

const RULE = "=".repeat(60);

export function writeOutput(text: string): void {
  process.stdout.write(text.endsWith("\n") ? text : `${text}\n`);
}

function banner(title: string): string[] {
  return ["", RULE, title, RULE, ""];
}

export function renderMessageList(title: string, messages: ChatMessage[], contentChars: number): string {
  return [...banner(title), ...messages.flatMap((message) => [formatMessageLine(message, contentChars), ""])].join("\n");
}

export function renderInteractions(pending: Interaction[]): string {
  if (pending.length === 0) {
    return "No pending interactions from allowed users.";
  }
  return [
    ...banner(`Pending Interactions (${pending.length} messages)`),
    ...pending.flatMap((entry) => [`  [${entry.timestamp}] ${entry.author}: ${entry.content}`, ""]),
  ].join("\n");
}

export function renderAllowlist(allowlist: AllowlistEntry[]): string {
  if (allowlist.length === 0) {
    return ["", "No allowlist configured - all users can interact.", "Set DISCORD_ALLOWED_USERS to restrict access."].join("\n");
  }
  return ["", "Allowed interactive users:", ...allowlist.map((entry) => `  ${entry.label} (ID: ${entry.id})`), ""].join("\n");
}
