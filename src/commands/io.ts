import { createInterface } from "readline/promises";
import { APP_NAME } from "../config.js";
import { isCliError } from "../errors.js";
import { formatLine } from "../log.js";

// Everything a command touches outside the filesystem, so tests can drive it.
export interface CommandIO {
  cwd: string;
  env: NodeJS.ProcessEnv;
  // Whether the output stream can take ANSI colours
  tty: boolean;
  out: (line: string) => void;
  err: (line: string) => void;
  ask: (question: string) => Promise<string>;
  now: () => Date;
}

export type Command = (argv: readonly string[], io: CommandIO) => Promise<number>;

async function askLine(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    // stdin may end (piped input, Ctrl-D) before an answer arrives.
    return await new Promise<string>((resolve, reject) => {
      rl.once("close", () => resolve(""));
      rl.question(question).then(resolve, reject);
    });
  } finally {
    rl.close();
  }
}

export function nodeIO(): CommandIO {
  return {
    cwd: process.cwd(),
    env: process.env,
    tty: process.stdout.isTTY === true,
    out: (line) => console.log(line),
    err: (line) => console.error(line),
    ask: askLine,
    now: () => new Date(),
  };
}

/**
 * Turn a CliError thrown anywhere in `body` into an `[ERROR]` line and its exit
 * code. Other errors propagate to the bin wrapper.
 */
export async function withCliErrors(io: CommandIO, body: () => Promise<number>): Promise<number> {
  try {
    return await body();
  } catch (error) {
    if (!isCliError(error)) throw error;
    const color = io.tty && !io.env.NO_COLOR;
    const [first, ...rest] = error.message.split("\n");
    io.err(formatLine("error", first, color));
    rest.forEach((line) => io.err(line));
    return error.exitCode;
  }
}

export function runMain(command: Command): void {
  command(process.argv.slice(2), nodeIO())
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(`[${APP_NAME}] Fatal error:`, error);
      process.exit(1);
    });
}
