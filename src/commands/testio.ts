import type { CommandIO } from "./io.js";

export interface TestIO extends CommandIO {
  lines: string[];
  questions: string[];
}

// Scripted IO for command tests: answers are handed out in order, output is recorded.
export function testIO(cwd: string, answers: string[] = [], env: NodeJS.ProcessEnv = {}): TestIO {
  const lines: string[] = [];
  const questions: string[] = [];
  const pending = [...answers];
  return {
    cwd,
    env,
    tty: false,
    lines,
    questions,
    out: (line) => lines.push(line),
    err: (line) => lines.push(line),
    ask: async (question) => {
      questions.push(question);
      return pending.shift() ?? "";
    },
    now: () => new Date(2025, 0, 2, 3, 4, 5),
  };
}
