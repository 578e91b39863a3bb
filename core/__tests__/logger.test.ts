import { describe, it, expect } from "vitest";
import { createLogger } from "../logger";

function makeLogger(verbose = false) {
  const lines: string[] = [];
  return { lines, logger: createLogger({ verbose, write: (line) => lines.push(line) }) };
}

describe("createLogger", () => {
  it("hides debug lines unless verbose", () => {
    const quiet = makeLogger();
    quiet.logger.debug("hidden");
    expect(quiet.lines).toEqual([]);

    const loud = makeLogger(true);
    loud.logger.debug("shown", { scope: "plan" });
    expect(loud.lines).toHaveLength(1);
    expect(loud.lines[0]).toContain("DEBUG");
    expect(loud.lines[0]).toContain("[plan]");
    expect(loud.lines[0]).toContain("shown");
  });

  it("prints data on the following lines", () => {
    const { lines, logger } = makeLogger();
    logger.info("Result", { data: { score: 1 } });
    expect(lines[0]?.endsWith(`\n${JSON.stringify({ score: 1 }, null, 2)}`)).toBe(true);
  });

  it("marks warnings", () => {
    const { lines, logger } = makeLogger();
    logger.warn("careful");
    expect(lines[0]).toContain("⚠ careful");
  });

  it("labels errors", () => {
    const { lines, logger } = makeLogger();
    logger.error("broken", { scope: "dispatch" });
    expect(lines[0]).toContain("ERROR");
    expect(lines[0]).toContain("broken");
  });
});
