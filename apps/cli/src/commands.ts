/**
 * Console Commands
 *
 * Turns one input line into store calls and printed lines:
 *
 *   new <url> [--limit N] [--user <uuid>]
 *   open <short|slug>
 *   list --user <uuid>
 *   delete <short|slug> --user <uuid>
 *   notifications --user <uuid>
 *   help
 *   exit | quit
 *
 * Command names and options are case-insensitive. Malformed input throws
 * `CommandError`; `execute` catches it, prints the message and keeps going.
 */

import {
  ErrorCode,
  extractSlug,
  formatShortUrl,
  generateOwnerId,
  parseOwnerId,
  validateSlug,
  type OwnerId,
} from "@shortbox/shared";
import type { LinkStore, Notifier } from "@shortbox/store";
import {
  HELP_TEXT,
  USAGE,
  formatCreated,
  formatEcho,
  formatLinkLine,
  formatNotification,
} from "./format.js";
import type { Viewer } from "./viewer.js";

// =============================================================================
// Types
// =============================================================================

export type Outcome = "continue" | "exit";

export type Output = (line: string) => void;

export interface CommandShellOptions {
  viewer: Viewer;
  output: Output;
}

/**
 * Prints each mailbox delivery as it happens. The message still waits in the
 * mailbox for `notifications`.
 */
export function createConsoleEcho(output: Output): Notifier {
  return {
    notify(ownerId, message) {
      output(formatEcho(ownerId, message));
    },
  };
}

/**
 * Malformed command input
 */
export class CommandError extends Error {
  constructor(
    readonly errorCode: ErrorCode,
    message: string
  ) {
    super(message);
    this.name = "CommandError";
  }
}

// =============================================================================
// Parsing
// =============================================================================

export function tokenize(line: string): string[] {
  const trimmed = line.trim();
  return trimmed === "" ? [] : trimmed.split(/\s+/);
}

function parseOwner(raw: string): OwnerId {
  const ownerId = parseOwnerId(raw);
  if (!ownerId) {
    throw new CommandError(ErrorCode.INVALID_IDENTITY, `Malformed owner identity: ${raw}`);
  }
  return ownerId;
}

function parseLimit(raw: string): number {
  const limit = /^-?\d+$/.test(raw) ? parseInt(raw, 10) : NaN;
  if (!Number.isInteger(limit) || limit < 1) {
    throw new CommandError(ErrorCode.INVALID_LIMIT, "Click limit must be an integer >= 1");
  }
  return limit;
}

export interface NewCommand {
  url: string;
  maxClicks?: number;
  ownerId?: OwnerId;
}

/**
 * Parse the arguments of `new`. An option missing its value counts as
 * unknown.
 */
export function parseNewCommand(tokens: string[]): NewCommand {
  const command: NewCommand = { url: tokens[1] ?? "" };

  for (let i = 2; i < tokens.length; i++) {
    const option = tokens[i].toLowerCase();
    const value = tokens[i + 1];

    if (option === "--limit" && value !== undefined) {
      command.maxClicks = parseLimit(value);
      i++;
    } else if (option === "--user" && value !== undefined) {
      command.ownerId = parseOwner(value);
      i++;
    } else {
      throw new CommandError(ErrorCode.UNKNOWN_OPTION, `Unknown option: ${tokens[i]}`);
    }
  }

  return command;
}

/**
 * Find `--user <uuid>` anywhere after the command name.
 */
export function requireOwner(tokens: string[]): OwnerId {
  for (let i = 1; i < tokens.length - 1; i++) {
    if (tokens[i].toLowerCase() === "--user") {
      return parseOwner(tokens[i + 1]);
    }
  }
  throw new CommandError(ErrorCode.INVALID_IDENTITY, "Missing --user <uuid>");
}

// =============================================================================
// Shell
// =============================================================================

const UNAVAILABLE: Record<typeof ErrorCode.EXPIRED | typeof ErrorCode.LIMIT_EXHAUSTED, string> = {
  EXPIRED: "Link unavailable: it has expired.",
  LIMIT_EXHAUSTED: "Link unavailable: click limit reached.",
};

export class CommandShell {
  private readonly viewer: Viewer;
  private readonly print: Output;

  constructor(
    private readonly store: LinkStore,
    options: CommandShellOptions
  ) {
    this.viewer = options.viewer;
    this.print = options.output;
  }

  /**
   * Run one input line. Never throws for bad input.
   */
  async execute(line: string): Promise<Outcome> {
    const tokens = tokenize(line);
    if (tokens.length === 0) return "continue";

    const name = tokens[0].toLowerCase();

    try {
      switch (name) {
        case "exit":
        case "quit":
          this.print("Shutting down...");
          return "exit";
        case "help":
          this.print(HELP_TEXT);
          break;
        case "new":
          this.create(tokens);
          break;
        case "open":
          await this.open(tokens);
          break;
        case "list":
          this.list(tokens);
          break;
        case "delete":
          this.delete(tokens);
          break;
        case "notifications":
          this.notifications(tokens);
          break;
        default:
          this.print("Unknown command. Type 'help'.");
      }
    } catch (err) {
      if (!(err instanceof CommandError)) throw err;
      this.print(`Error: ${err.message}`);
    }

    return "continue";
  }

  private create(tokens: string[]): void {
    if (tokens.length < 2) {
      this.print(USAGE.new);
      return;
    }

    const command = parseNewCommand(tokens);
    const ownerId = command.ownerId ?? generateOwnerId();

    const result = this.store.registry.create({
      ownerId,
      targetUrl: command.url,
      maxClicks: command.maxClicks,
    });
    if (!result.success) {
      throw new CommandError(result.errorCode, result.error);
    }

    for (const line of formatCreated(result.data, command.ownerId ? null : ownerId)) {
      this.print(line);
    }
  }

  private async open(tokens: string[]): Promise<void> {
    if (tokens.length < 2) {
      this.print(USAGE.open);
      return;
    }

    const raw = tokens[1];
    const slug = extractSlug(raw);
    if (!validateSlug(slug).valid) {
      this.print(`Link not found: ${raw}`);
      return;
    }

    const result = this.store.registry.consume(slug);
    if (!result.success) {
      this.print(
        result.errorCode === ErrorCode.NOT_FOUND
          ? `Link not found: ${raw}`
          : UNAVAILABLE[result.errorCode]
      );
      return;
    }

    const { targetUrl } = result.data;
    this.print(`Opening: ${targetUrl}`);
    try {
      await this.viewer.open(targetUrl);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.print(`Could not open the browser (${reason}). Open it manually: ${targetUrl}`);
    }
  }

  private list(tokens: string[]): void {
    const ownerId = requireOwner(tokens);
    const links = this.store.registry.listByOwner(ownerId);

    if (links.length === 0) {
      this.print(`No links for owner ${ownerId}`);
      return;
    }

    this.print(`Links of owner ${ownerId}:`);
    for (const link of links) {
      this.print(formatLinkLine(link, this.store.registry.isExpired(link)));
    }
  }

  private delete(tokens: string[]): void {
    if (tokens.length < 2) {
      this.print(USAGE.delete);
      return;
    }

    const raw = tokens[1];
    const slug = extractSlug(raw);
    const ownerId = requireOwner(tokens);

    if (!validateSlug(slug).valid) {
      this.print(`Link not found: ${raw}`);
      return;
    }

    const result = this.store.registry.delete(slug, ownerId);
    if (!result.success) {
      this.print(
        result.errorCode === ErrorCode.FORBIDDEN
          ? "Delete refused: the link belongs to another owner."
          : `Link not found: ${raw}`
      );
      return;
    }

    this.print(`Link deleted: ${formatShortUrl(slug)}`);
  }

  private notifications(tokens: string[]): void {
    const ownerId = requireOwner(tokens);
    const notifications = this.store.mailbox.drain(ownerId);

    if (notifications.length === 0) {
      this.print("No notifications.");
      return;
    }

    this.print("Notifications:");
    for (const notification of notifications) {
      this.print(formatNotification(notification));
    }
  }
}
