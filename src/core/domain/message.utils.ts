import { isAfter, parseISO, subMinutes } from "date-fns";
import type { ChatAuthor, ChatMessage } from "./message.types";
import { compareSnowflakes } from "./snowflake.utils";

export function authorName(author: ChatAuthor): string {
  return author.displayName || author.username;
}

export function isHumanMessage(message: ChatMessage, selfId?: string): boolean {
  if (message.author.automated) {
    return false;
  }
  return !selfId || message.author.id !== selfId;
}

export function toChronological(messages: ChatMessage[]): ChatMessage[] {
  return [...messages].sort((left, right) => compareSnowflakes(left.id, right.id));
}

export function sinceCutoff(now: Date, sinceMinutes: number): Date {
  return subMinutes(now, sinceMinutes);
}

export function isNewerThan(message: ChatMessage, cutoff: Date): boolean {
  return isAfter(parseISO(message.createdAt), cutoff);
}

/** `2024-05-01T12:34:56.789+00:00` -> `2024-05-01 12:34` */
export function shortTimestamp(createdAt: string): string {
  return createdAt.slice(0, 16).replace("T", " ");
}

export function longTimestamp(createdAt: string): string {
  return createdAt.slice(0, 19).replace("T", " ");
}

export function formatMessageLine(message: ChatMessage, maxContentChars = 500): string {
  const prefix = message.author.automated ? "[BOT]" : "[USER]";
  return `${prefix} [${shortTimestamp(message.createdAt)}] ${authorName(message.author)}: ${message.content.slice(0, maxContentChars)}`;
}

export function formatFlagLine(message: ChatMessage): string {
  return `[${longTimestamp(message.createdAt)}] ${authorName(message.author)}: ${message.content}`;
}

export function formatInjectionText(source: string, message: ChatMessage): string {
  return `[${source} from ${authorName(message.author)}]: ${message.content}`;
}

export function formatPreview(content: string, maxChars: number): string {
  return content.replace(/\s*\n\s*/g, " ").slice(0, maxChars);
}
