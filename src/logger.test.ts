import { describe, expect, it } from "vitest";
import { createRuntimeLogger } from "./logger.js";

describe("createRuntimeLogger", () => {
  it("prefixes levels and routes warnings to the error stream", () => {
    const out: string[] = [];
    const err: string[] = [];
    const log = createRuntimeLogger({
      log: (msg) => out.push(msg),
      error: (msg) => err.push(msg),
      debug: true,
    });
    log.debug?.("declared");
    log.info("ready");
    log.warn("fallback");
    log.error("broken");
    expect(out).toEqual(["[debug] declared", "[info] ready"]);
    expect(err).toEqual(["[warn] fallback", "[error] broken"]);
  });

  it("drops debug output unless enabled", () => {
    const log = createRuntimeLogger({ log: () => {}, error: () => {} });
    expect(log.debug).toBeUndefined();
  });
});
