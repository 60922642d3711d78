import type { OptionChangeHook } from "./option.js";
import type { OptionsMap } from "./registry.js";
import { resolveProtocol } from "./render.js";

const PIECE_TO_CHAR =
  "PNBRQ.E....C.AF.MH.SU........D............LKpnbrq.e....c.af.mh.su........d............lk";

const BOARD_TEMPLATE = "seirawan";
const BOARD_FILES = 8;
const BOARD_RANKS = 10;

/**
 * Fairy piece moves in Betza notation, announced to xboard controllers.
 * See https://www.gnu.org/software/xboard/Betza.html
 */
const PIECE_DEFINITIONS: ReadonlyArray<readonly [letter: string, betza: string]> = [
  ["L", "NB2"],
  ["C", "llNrrNDK"],
  ["E", "KDA"],
  ["U", "CN"],
  ["S", "B2DN"],
  ["D", "QN"],
  ["F", "B3DfNbN"],
  ["M", "NR"],
  ["A", "NB"],
  ["H", "DHAG"],
  ["K", "KisO2"],
];

/**
 * Lines announcing the variant to the controller in the active dialect.
 */
export function formatVariantAnnouncement(params: {
  protocol: "uci" | "xboard";
  variant: string;
  startFen: string;
}): string[] {
  const { protocol, variant, startFen } = params;
  if (protocol === "xboard") {
    return [
      `setup (${PIECE_TO_CHAR}) ${BOARD_FILES}x${BOARD_RANKS}+0_${BOARD_TEMPLATE} ${startFen}`,
      ...PIECE_DEFINITIONS.map(([letter, betza]) => `piece ${letter}& ${betza}`),
    ];
  }
  return [
    `info string variant ${variant} files ${BOARD_FILES} ranks ${BOARD_RANKS} pocket 0` +
      ` template ${BOARD_TEMPLATE} startpos ${startFen}`,
  ];
}

/**
 * Change hook for `UCI_Variant`: writes the variant announcement through
 * `write`, one call per line.
 */
export function createVariantAnnouncer(params: {
  map: OptionsMap;
  write: (line: string) => void;
  startFen: string;
}): OptionChangeHook {
  const { map, write, startFen } = params;
  return (option) => {
    const variant = option.kind === "combo" || option.kind === "string" ? option.currentValue : "";
    const lines = formatVariantAnnouncement({
      protocol: resolveProtocol(map),
      variant,
      startFen,
    });
    for (const line of lines) {
      write(line);
    }
  };
}
