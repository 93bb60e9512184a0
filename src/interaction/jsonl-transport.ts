import readline from "node:readline";
import type { Readable, Writable } from "node:stream";
import { errorMessage } from "../core/errors.js";
import type { EngineMessage } from "../types/interaction.js";
import type { ConsoleTransport, InteractionChannel } from "./channel.js";

/**
 * Operator console over JSON lines: engine messages are written one per line
 * to `output`, responses are read one per line from `input`. End of input is
 * treated as the operator disconnecting.
 */
export class JsonlConsoleTransport implements ConsoleTransport {
  private rl: readline.Interface | null = null;

  constructor(
    private readonly input: Readable,
    private readonly output: Writable,
  ) {}

  send(message: EngineMessage): Promise<void> {
    return new Promise((resolve, reject) => {
      this.output.write(JSON.stringify(message) + "\n", (err) => (err ? reject(err) : resolve()));
    });
  }

  /**
   * Attach to the channel and start feeding responses into it.
   * Lines the channel refuses are reported through `onRefused`.
   */
  connect(channel: InteractionChannel, onRefused?: (error: string, line: string) => void): void {
    channel.attach(this);
    this.rl = readline.createInterface({ input: this.input, crlfDelay: Infinity });

    this.rl.on("line", (line) => {
      if (line.trim() === "") return;
      let data: unknown;
      try {
        data = JSON.parse(line);
      } catch (e) {
        onRefused?.(`Invalid JSON from console: ${errorMessage(e)}`, line);
        return;
      }
      const delivered = channel.deliver(data);
      if (!delivered.ok) onRefused?.(delivered.error, line);
    });

    this.rl.on("close", () => {
      this.rl = null;
      channel.detach("operator console closed");
    });
  }

  close(): void {
    this.rl?.close();
  }
}
