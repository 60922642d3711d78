import { describe, expect, it, vi } from "vitest";
import {
  declareEngineOptions,
  loadEngineOptionTable,
  MAX_HASH_MB_32,
  parseEngineOptionTable,
} from "./engine-options.js";
import { OptionsMap } from "./registry.js";
import { renderOptions } from "./render.js";

describe("loadEngineOptionTable", () => {
  it("loads the built-in table in announcement order", () => {
    const table = loadEngineOptionTable();
    expect(table).toHaveLength(41);
    expect(table.slice(0, 5).map((row) => row.name)).toEqual([
      "Protocol",
      "Debug Log File",
      "Contempt",
      "Analysis Contempt",
      "Threads",
    ]);
    expect(table.at(-1)?.name).toBe("FortressValueEg");
  });
});

describe("parseEngineOptionTable", () => {
  it("accepts a well-formed table", () => {
    const result = parseEngineOptionTable([
      { name: "Ponder", type: "check", default: false },
      { name: "Hash", type: "spin", default: 16, min: 1, max: "maxHashMb", onChange: "hashSize" },
    ]);
    expect(result.ok).toBe(true);
  });

  it("reports rows missing fields", () => {
    const result = parseEngineOptionTable([{ name: "Threads", type: "spin", default: 1 }]);
    expect(result.ok).toBe(false);
    expect(!result.ok && result.errors.length).toBeGreaterThan(0);
  });

  it("rejects unknown hook ids", () => {
    const result = parseEngineOptionTable([{ name: "Ponder", type: "check", default: false, onChange: "ponder" }]);
    expect(result.ok).toBe(false);
  });
});

describe("declareEngineOptions", () => {
  it("declares every row and renders the UCI handshake block", () => {
    const map = new OptionsMap();
    declareEngineOptions(map);
    expect(map.size).toBe(41);

    const lines = renderOptions(map).split("\n");
    expect(lines[0]).toBe("");
    expect(lines[1]).toBe("option name Debug Log File type string default ");
    expect(lines[2]).toBe("option name Contempt type spin default 21 min -100 max 100");
    expect(lines[5]).toBe("option name Hash type spin default 16 min 1 max 131072");
    expect(lines[6]).toBe("option name Clear Hash type button");
    expect(lines[14]).toBe("option name UCI_Variant type combo default musketeer var musketeer");
    expect(lines[17]).toBe("option name SyzygyPath type string default <empty>");
    expect(lines[21]).toBe("option name CannonValueMg type spin default 1710 min 710 max 2710");
    expect(lines).toHaveLength(41);
  });

  it("renders the xboard feature block", () => {
    const map = new OptionsMap();
    declareEngineOptions(map);
    map.set("Protocol", "xboard");

    const lines = renderOptions(map).split("\n");
    expect(lines[4]).toBe('feature option="Threads -spin 1 1 512"');
    expect(lines[7]).toBe('feature option="Ponder -check 0"');
    expect(lines[3]).toBe('feature option="Analysis Contempt -combo Both /// Off /// White /// Black"');
    expect(lines[19]).toBe('feature option="Syzygy50MoveRule -check 1"');
  });

  it("bounds Hash by the configured ceiling", () => {
    const map = new OptionsMap();
    declareEngineOptions(map, { maxHashMb: MAX_HASH_MB_32 });
    expect(map.require("Hash", "spin").max).toBe(2048);
    map.set("Hash", "4096");
    expect(map.require("Hash", "spin").currentValue).toBe(16);
  });

  it("wires collaborator hooks by id", () => {
    const threads = vi.fn();
    const pieceValue = vi.fn();
    const clearHash = vi.fn();
    const map = new OptionsMap();
    declareEngineOptions(map, { hooks: { threads, pieceValue, clearHash } });

    map.set("Threads", "8");
    map.set("HawkValueEg", "1600");
    map.set("ElephantValueMg", "1800");
    map.set("Clear Hash", "");
    map.set("MultiPV", "3");

    expect(threads).toHaveBeenCalledTimes(1);
    expect(pieceValue).toHaveBeenCalledTimes(2);
    expect(clearHash).toHaveBeenCalledTimes(1);
    expect(map.require("MultiPV", "spin").currentValue).toBe(3);
  });

  it("declares from a custom table", () => {
    const map = new OptionsMap();
    declareEngineOptions(map, {
      table: [
        { name: "Protocol", type: "combo", default: "uci", values: ["uci", "xboard"] },
        { name: "Hash", type: "spin", default: 16, min: 1, max: "maxHashMb" },
      ],
      maxHashMb: 64,
    });
    expect(renderOptions(map)).toBe("\noption name Hash type spin default 16 min 1 max 64");
  });
});
