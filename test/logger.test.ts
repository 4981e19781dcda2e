import { LogLevels } from "consola";
import { describe, expect, test } from "vitest";
import { createLogger, isLogLevelName } from "../src/logger";

describe("createLogger", () => {
  test("applies the requested level", () => {
    expect(createLogger("debug").level).toBe(LogLevels.debug);
    expect(createLogger("silent").level).toBe(LogLevels.silent);
  });

  test("recognises consola level names", () => {
    expect(isLogLevelName("trace")).toBe(true);
    expect(isLogLevelName("loud")).toBe(false);
    expect(isLogLevelName("toString")).toBe(false);
  });
});
