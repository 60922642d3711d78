import { describe, expect, it } from "vitest";
import { createEngineOptions } from "../engine.js";
import { createVariantAnnouncer, formatVariantAnnouncement } from "./variant.js";

const START_FEN = "test-start-fen";

describe("formatVariantAnnouncement", () => {
  it("describes the board in one info line for UCI", () => {
    expect(
      formatVariantAnnouncement({ protocol: "uci", variant: "musketeer", startFen: START_FEN }),
    ).toEqual([
      "info string variant musketeer files 8 ranks 10 pocket 0 template seirawan startpos test-start-fen",
    ]);
  });

  it("sends setup and Betza piece lines for xboard", () => {
    const lines = formatVariantAnnouncement({
      protocol: "xboard",
      variant: "musketeer",
      startFen: START_FEN,
    });
    expect(lines).toHaveLength(12);
    expect(lines[0]).toBe(
      "setup (PNBRQ.E....C.AF.MH.SU........D............LKpnbrq.e....c.af.mh.su........d............lk)" +
        " 8x10+0_seirawan test-start-fen",
    );
    expect(lines[1]).toBe("piece L& NB2");
    expect(lines[7]).toBe("piece F& B3DfNbN");
    expect(lines[11]).toBe("piece K& KisO2");
  });
});

describe("createVariantAnnouncer", () => {
  it("announces in whichever dialect Protocol selects", () => {
    const written: string[] = [];
    const map = createEngineOptions({
      hooks: (options) => ({
        variant: createVariantAnnouncer({
          map: options,
          write: (line) => written.push(line),
          startFen: START_FEN,
        }),
      }),
    });

    map.set("UCI_Variant", "musketeer");
    expect(written).toEqual([
      "info string variant musketeer files 8 ranks 10 pocket 0 template seirawan startpos test-start-fen",
    ]);

    written.length = 0;
    map.set("Protocol", "xboard");
    map.set("UCI_Variant", "musketeer");
    expect(written).toHaveLength(12);
    expect(written[0]?.startsWith("setup (")).toBe(true);
  });

  it("stays quiet for values outside the variant list", () => {
    const written: string[] = [];
    const map = createEngineOptions({
      hooks: (options) => ({
        variant: createVariantAnnouncer({
          map: options,
          write: (line) => written.push(line),
          startFen: START_FEN,
        }),
      }),
    });
    map.set("UCI_Variant", "chess");
    expect(written).toEqual([]);
  });
});
