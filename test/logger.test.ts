import { describe, expect, it } from "vitest";
import { Chalk } from "chalk";
import { createLogger } from "../src/logging/logger.js";

const plain = new Chalk({ level: 0 });
const fixedClock = () => new Date(2024, 0, 2, 9, 5, 7);

function capture() {
  const lines: string[] = [];
  return { lines, stream: { write: (s: string) => lines.push(s) } };
}

describe("logger", () => {
  it("drops debug lines unless verbose", () => {
    const { lines, stream } = capture();
    const logger = createLogger({ format: "jsonl", stream });

    logger.debug("HTTP", "GET /projects -> 200");
    logger.info("START", "starting");

    expect(lines).toEqual(['{"level":"info","code":"START","message":"starting"}\n']);
  });

  it("writes jsonl records with fields flattened", () => {
    const { lines, stream } = capture();
    const logger = createLogger({ format: "jsonl", verbose: true, stream });

    logger.debug("HTTP", "GET x -> 404", { status: 404 });

    expect(JSON.parse(lines[0])).toEqual({ level: "debug", code: "HTTP", message: "GET x -> 404", status: 404 });
  });

  it("writes human lines with a clock and project scope", () => {
    const { lines, stream } = capture();
    const logger = createLogger({ verbose: true, stream, color: plain, now: fixedClock });

    logger.warn("W", "slow response", { project: "team/api" });
    logger.error("E", "gave up");

    expect(lines).toEqual(["09:05:07 [team/api] slow response\n", "09:05:07 gave up\n"]);
  });
});
