import type { DesktopNotification } from "../../core/ports/desktop.types";

/** Escapes a value for use inside a double-quoted AppleScript string literal. */
export function escapeAppleScript(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

export function notificationScript(notification: DesktopNotification): string {
  const sound = notification.sound ? ` sound name "${escapeAppleScript(notification.sound)}"` : "";
  return `display notification "${escapeAppleScript(notification.message)}" with title "${escapeAppleScript(notification.title)}"${sound}`;
}

export function namedSessionScript(sessionMatch: string, text: string): string {
  return [
    'tell application "iTerm2"',
    "  repeat with w in windows",
    "    repeat with t in tabs of w",
    "      repeat with s in sessions of t",
    `        if name of s contains "${escapeAppleScript(sessionMatch)}" then`,
    `          tell s to write text "${escapeAppleScript(text)}"`,
    '          return "Injected into session: " & (name of s)',
    "        end if",
    "      end repeat",
    "    end repeat",
    "  end repeat",
    "end tell",
    `error "No iTerm2 session matching ${escapeAppleScript(sessionMatch)}"`,
  ].join("\n");
}

export function currentSessionScript(text: string): string {
  return [
    'tell application "iTerm2"',
    "  tell current session of current window",
    `    write text "${escapeAppleScript(text)}"`,
    "  end tell",
    "end tell",
    'return "Injected into current session"',
  ].join("\n");
}
