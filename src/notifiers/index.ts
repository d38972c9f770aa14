import { DesktopNotifier, supportsDesktop, type CommandRunner } from "./desktopNotifier.js";
import { FanoutNotifier, type Notifier } from "./notifier.js";
import { TerminalNotifier } from "./terminalNotifier.js";

export type NotifierOptions = {
  desktop: boolean;
  platform?: NodeJS.Platform;
  write?: (text: string) => void;
  run?: CommandRunner;
};

/** Terminal alerts always; desktop alerts too where the OS has a command for them. */
export function createNotifier(opts: NotifierOptions): Notifier {
  const platform = opts.platform ?? process.platform;
  const terminal = new TerminalNotifier(opts.write);
  if (!opts.desktop || !supportsDesktop(platform)) return terminal;
  return new FanoutNotifier([terminal, new DesktopNotifier(platform, opts.run)]);
}
