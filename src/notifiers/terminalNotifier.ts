import type { CrossingEvent } from "../types.js";
import { formatAlert, type Notifier } from "./notifier.js";

export class TerminalNotifier implements Notifier {
  constructor(
    private readonly write: (text: string) => void = (text) => {
      process.stderr.write(text);
    },
    private readonly bell = true
  ) {}

  async notify(event: CrossingEvent): Promise<void> {
    const { title, body } = formatAlert(event);
    this.write(`${this.bell ? "\x07" : ""}[alert] ${title}: ${body}\n`);
  }
}
