import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createLogger, getLogLevel, setLogLevel, setLogSink } from "./logger";

describe("logger", () => {
  let lines: string[];
  let restore: (line: string) => void;
  let previousLevel: ReturnType<typeof getLogLevel>;

  beforeEach(() => {
    lines = [];
    previousLevel = getLogLevel();
    restore = setLogSink((line) => {
      lines.push(line);
    });
  });

  afterEach(() => {
    setLogSink(restore);
    setLogLevel(previousLevel);
  });

  it("formats scope, message and fields", () => {
    setLogLevel("info");
    createLogger("chat").info("applied actions", {
      boardId: "b1",
      applied: 2,
      note: "two words",
      skipped: undefined,
    });
    expect(lines).toEqual(['[boardchat] info chat: applied actions boardId=b1 applied=2 note="two words"\n']);
  });

  it("drops lines below the current level", () => {
    setLogLevel("warn");
    const log = createLogger("store");
    log.debug("quiet");
    log.info("quiet");
    log.warn("loud");
    log.error("louder", { code: null });
    expect(lines).toEqual([
      "[boardchat] warn store: loud\n",
      "[boardchat] error store: louder code=null\n",
    ]);
  });
});
