import { execFile } from "node:child_process";
import type { Logger } from "../logging/logger.js";

export type Launcher = (
  command: string,
  args: string[],
  callback: (error: Error | null) => void,
) => void;

const execLauncher: Launcher = (command, args, callback) => {
  execFile(command, args, (error) => callback(error));
};

export interface OpenReceiptOpts {
  readonly platform?: NodeJS.Platform;
  readonly launch?: Launcher;
}

/** Opens the receipt with the default viewer on macOS; a no-op elsewhere. */
export function openReceipt(path: string, logger: Logger, opts: OpenReceiptOpts = {}): boolean {
  const platform = opts.platform ?? process.platform;
  if (platform !== "darwin") return false;

  const launch = opts.launch ?? execLauncher;
  launch("open", [path], (error) => {
    if (error) {
      logger.warn({ err: error, path }, "Failed to open receipt");
    }
  });
  return true;
}
