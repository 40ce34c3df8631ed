import type { z } from "zod";

export function parseNumber(value: string | undefined): number | undefined {
  if (!value || value.trim().length === 0) {
    return undefined;
  }
  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/** `0`, `false`, `no` and `off` disable; any other non-empty value enables. */
export function parseFlag(value: string | undefined): boolean | undefined {
  if (!value || value.trim().length === 0) {
    return undefined;
  }
  return !["0", "false", "no", "off"].includes(value.trim().toLowerCase());
}

export function trimmed(value: string | undefined): string | undefined {
  return value?.trim() || undefined;
}

export function toFriendlyZodError(error: z.ZodError): string {
  const details = error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "root";
      return `- ${path}: ${issue.message}`;
    })
    .join("\n");
  return `Malformed discord-relay config:\n${details}`;
}
