import { execa } from "execa";

import type { CrossingEvent } from "../types.js";
import { formatAlert, type AlertMessage, type Notifier } from "./notifier.js";

const APP_NAME = "quota-watch";

export const COMMAND_TIMEOUT_MS = 5_000;

export type CommandRunner = (file: string, args: string[], opts: { timeout: number }) => Promise<unknown>;

export type DesktopCommand = {
  file: string;
  args: string[];
};

function appleScriptString(s: string): string {
  return `"${s.replaceAll("\\", "\\\\").replaceAll('"', '\\"')}"`;
}

/** The OS command that shows `msg`, or null where none is known. */
export function desktopCommandFor(platform: NodeJS.Platform, msg: AlertMessage): DesktopCommand | null {
  switch (platform) {
    case "darwin":
      return {
        file: "osascript",
        args: [
          "-e",
          `display notification ${appleScriptString(msg.body)} with title ${appleScriptString(APP_NAME)} subtitle ${appleScriptString(msg.title)}`,
        ],
      };
    case "linux":
      return { file: "notify-send", args: ["--app-name", APP_NAME, msg.title, msg.body] };
    default:
      return null;
  }
}

export function supportsDesktop(platform: NodeJS.Platform): boolean {
  return desktopCommandFor(platform, { title: "", body: "" }) !== null;
}

/** Shows alerts through the OS; does nothing on platforms without a known command. */
export class DesktopNotifier implements Notifier {
  constructor(
    private readonly platform: NodeJS.Platform = process.platform,
    private readonly run: CommandRunner = (file, args, opts) => execa(file, args, opts)
  ) {}

  async notify(event: CrossingEvent): Promise<void> {
    const cmd = desktopCommandFor(this.platform, formatAlert(event));
    if (!cmd) return;
    await this.run(cmd.file, cmd.args, { timeout: COMMAND_TIMEOUT_MS });
  }
}
