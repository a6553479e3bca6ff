/**
 * External viewer: hands a URL to whatever opens links on this machine.
 */

import { spawn } from "node:child_process";

export interface Viewer {
  open(url: string): Promise<void>;
}

/**
 * Command that opens `url` on `platform`. The URL is always a single argv
 * entry and never passes through a shell.
 */
export function openerFor(
  platform: NodeJS.Platform,
  url: string
): { command: string; args: string[] } {
  switch (platform) {
    case "darwin":
      return { command: "open", args: [url] };
    case "win32":
      return { command: "rundll32", args: ["url.dll,FileProtocolHandler", url] };
    default:
      return { command: "xdg-open", args: [url] };
  }
}

/**
 * Launch the platform opener detached. Resolves once the process started;
 * a missing opener rejects.
 */
export function createSystemViewer(platform: NodeJS.Platform = process.platform): Viewer {
  return {
    open(url) {
      const { command, args } = openerFor(platform, url);
      return new Promise((resolve, reject) => {
        const child = spawn(command, args, { detached: true, stdio: "ignore" });
        child.once("error", reject);
        child.once("spawn", () => {
          child.unref();
          resolve();
        });
      });
    },
  };
}
