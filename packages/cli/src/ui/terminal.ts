import readline from "readline";
import chalk from "chalk";
import ora from "ora";

export interface Spinner {
  stop(): void;
}

/**
 * Everything the planner shows to, or reads from, the user.
 * Services depend on this interface; tests substitute a recording fake.
 */
export interface Terminal {
  heading(text: string): void;
  info(text: string): void;
  notice(text: string): void;
  /** Bold label followed by a value, e.g. "Planning feature: ..." */
  labeled(label: string, text: string): void;
  success(text: string): void;
  skipped(text: string): void;
  /** A reply from the model */
  agent(text: string): void;
  error(label: string, text: string): void;
  startSpinner(text: string): Spinner;
  /** Read one line; null on end of input or Ctrl+C. */
  prompt(label: string): Promise<string | null>;
  close(): void;
}

export interface ConsoleTerminalOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Treat input as an interactive TTY (raw mode, readline SIGINT handling) */
  interactive?: boolean;
}

/** Terminal backed by stdin/stdout: chalk for styling, ora for spinners, readline for input. */
export class ConsoleTerminal implements Terminal {
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private readonly interactive: boolean;
  private rl: readline.Interface | null = null;
  private closed = false;
  /** Lines that arrived while no prompt was pending (piped input) */
  private queued: string[] = [];
  private waiting: ((line: string | null) => void) | null = null;

  constructor(options: ConsoleTerminalOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
    this.interactive = options.interactive ?? process.stdout.isTTY === true;
  }

  heading(text: string): void {
    this.writeLine(chalk.bold.cyan(text));
  }

  info(text: string): void {
    this.writeLine(text);
  }

  notice(text: string): void {
    this.writeLine(chalk.italic(text));
  }

  labeled(label: string, text: string): void {
    this.writeLine(`${chalk.bold(`${label}:`)} ${text}`);
  }

  success(text: string): void {
    this.writeLine(`✅ ${text}`);
  }

  skipped(text: string): void {
    this.writeLine(`ℹ️  ${text}`);
  }

  agent(text: string): void {
    this.writeLine(`${chalk.bold.magenta("Agent:")} ${text.trim()}\n`);
  }

  error(label: string, text: string): void {
    this.writeLine(`${chalk.bold.red(`${label}:`)} ${text}`);
  }

  startSpinner(text: string): Spinner {
    // readline owns stdin; ora must not pause it or leave raw mode when the spinner stops
    const spinner = ora({ text, isEnabled: this.interactive, discardStdin: false }).start();
    return { stop: () => spinner.stop() };
  }

  prompt(label: string): Promise<string | null> {
    const rl = this.getInterface();
    const line = this.queued.shift();
    if (line !== undefined) return Promise.resolve(line);
    if (this.closed) return Promise.resolve(null);

    rl.setPrompt(`${chalk.bold.green(label)} `);
    rl.prompt();
    return new Promise((resolve) => {
      // Non-TTY input never enters raw mode, so Ctrl+C arrives as a process signal
      const onSignal = () => rl.close();
      if (!this.interactive) process.once("SIGINT", onSignal);
      this.waiting = (value) => {
        process.off("SIGINT", onSignal);
        resolve(value);
      };
    });
  }

  close(): void {
    this.rl?.close();
  }

  private getInterface(): readline.Interface {
    if (this.rl) return this.rl;
    const rl = readline.createInterface({
      input: this.input,
      output: this.output,
      terminal: this.interactive,
    });
    rl.on("line", (line) => {
      const waiting = this.waiting;
      this.waiting = null;
      if (waiting) waiting(line);
      else this.queued.push(line);
    });
    rl.on("SIGINT", () => rl.close());
    rl.on("close", () => {
      this.closed = true;
      const waiting = this.waiting;
      this.waiting = null;
      waiting?.(null);
    });
    this.rl = rl;
    return rl;
  }

  private writeLine(text: string): void {
    this.output.write(`${text}\n`);
  }
}

/** Run a model request with a spinner shown until it settles. */
export async function withSpinner<T>(
  terminal: Terminal,
  text: string,
  task: () => Promise<T>
): Promise<T> {
  const spinner = terminal.startSpinner(text);
  try {
    return await task();
  } finally {
    spinner.stop();
  }
}
