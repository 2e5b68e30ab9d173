import readline from "node:readline";
import type { ChalkInstance } from "chalk";
import { parseAnswer, type ConfirmMerge } from "./merge.js";
import { renderMergeCandidate } from "./render.js";

export type TerminalConfirm = {
  confirm: ConfirmMerge;
  close: () => void;
};

/**
 * y/n confirmation on stdin/stdout. Once stdin ends every further call
 * resolves `quit`.
 */
export function createTerminalConfirm(
  c: ChalkInstance,
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout,
): TerminalConfirm {
  const rl = readline.createInterface({ input, output });
  let closed = false;
  rl.on("close", () => {
    closed = true;
  });

  const confirm: ConfirmMerge = (candidate) => {
    if (closed) return Promise.resolve("quit");
    output.write(renderMergeCandidate(candidate, c));

    return new Promise((resolve) => {
      const onClose = () => resolve("quit");
      rl.once("close", onClose);
      rl.question(c.bold.yellow("Merge this MR? (y/n): "), (answer) => {
        rl.off("close", onClose);
        resolve(parseAnswer(answer));
      });
    });
  };

  return {
    confirm,
    close: () => {
      if (!closed) rl.close();
    },
  };
}
