/**
 * Console output formatting
 */

import { formatShortUrl, type ClickBudget, type LinkRecord, type Notification } from "@shortbox/shared";

// =============================================================================
// Usage
// =============================================================================

export const USAGE = {
  new: "Usage: new <url> [--limit N] [--user <uuid>]",
  open: "Usage: open <short|slug>",
  list: "Usage: list --user <uuid>",
  delete: "Usage: delete <short|slug> --user <uuid>",
  notifications: "Usage: notifications --user <uuid>",
} as const;

export const HELP_TEXT = [
  "Commands:",
  "  new <url> [--limit N] [--user <uuid>]   Create a short link. Without --user a new owner id is generated.",
  "  open <short|slug>                       Follow a short link in the browser. Counts against the limit.",
  "  list --user <uuid>                      Show an owner's links.",
  "  delete <short|slug> --user <uuid>       Delete a link (owner only).",
  "  notifications --user <uuid>             Show and clear an owner's notifications.",
  "  help                                    Show this help.",
  "  exit | quit                             Leave the console.",
  "Examples:",
  "  new https://example.com/some/long/path --limit 3",
  "  open sbx.li/aB3xY9kQ",
  "  list --user 11111111-1111-4111-8111-111111111111",
].join("\n");

// =============================================================================
// Values
// =============================================================================

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/**
 * `YYYY-MM-DD HH:mm:ss` in local time
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Whole hours or minutes where the value divides evenly, seconds otherwise.
 */
export function formatDuration(seconds: number): string {
  if (seconds > 0 && seconds % 3600 === 0) return `${seconds / 3600} h`;
  if (seconds > 0 && seconds % 60 === 0) return `${seconds / 60} min`;
  return `${seconds} s`;
}

function maxOf(clicks: ClickBudget): string {
  return clicks.kind === "limited" ? String(clicks.max) : "∞";
}

function remainingOf(clicks: ClickBudget): string {
  return clicks.kind === "limited" ? String(clicks.remaining) : "∞";
}

// =============================================================================
// Blocks
// =============================================================================

/**
 * Confirmation printed after `new`. `generatedOwnerId` is set when the
 * caller had no identity yet.
 */
export function formatCreated(link: LinkRecord, generatedOwnerId: string | null): string[] {
  const lines: string[] = [];
  if (generatedOwnerId) {
    lines.push(`Generated owner id: ${generatedOwnerId}`);
  }
  lines.push(
    `Short link:  ${formatShortUrl(link.slug)}`,
    `Original:    ${link.targetUrl}`,
    `Limit:       ${link.clicks.kind === "limited" ? link.clicks.max : "unlimited"}`,
    `Remaining:   ${remainingOf(link.clicks)}`,
    `Expires at:  ${formatTimestamp(link.expiresAt)}`
  );
  return lines;
}

export function formatLinkLine(link: LinkRecord, expired: boolean): string {
  return (
    `- ${formatShortUrl(link.slug)} -> ${link.targetUrl}` +
    ` | limit: ${maxOf(link.clicks)}, remaining: ${remainingOf(link.clicks)}` +
    `, expires: ${formatTimestamp(link.expiresAt)}` +
    (expired ? " [EXPIRED]" : "")
  );
}

export function formatNotification(notification: Notification): string {
  return `[${formatTimestamp(notification.timestamp)}] ${notification.message}`;
}

/** Console echo of a message delivered to an owner's mailbox */
export function formatEcho(ownerId: string, message: string): string {
  return `[Notification for ${ownerId}] ${message}`;
}

export function formatSweepSummary(evicted: number): string {
  return `Cleanup finished: removed ${evicted} expired link(s).`;
}
