/**
 * Color-coded debug logger.
 *
 * Every line carries a magenta [calc] prefix and a level tag so it is easy
 * to spot in a terminal and to grep:
 *
 *   grep -rn "devLog" src/
 *
 * Set CALC_DEBUG=0 to silence INFO and WARN lines. ERROR lines always print.
 */

const RESET = "\x1b[0m";
const MAGENTA = "\x1b[35m";
const CYAN = "\x1b[36m";
const YELLOW = "\x1b[33m";
const RED = "\x1b[31m";

const PREFIX = `${MAGENTA}[calc]${RESET}`;

function quiet(): boolean {
  return process.env["CALC_DEBUG"] === "0";
}

export function devLog(...args: unknown[]): void {
  if (quiet()) return;
  console.log(PREFIX, `${CYAN}INFO${RESET}`, ...args);
}

export function devWarn(...args: unknown[]): void {
  if (quiet()) return;
  console.log(PREFIX, `${YELLOW}WARN${RESET}`, ...args);
}

export function devError(...args: unknown[]): void {
  console.log(PREFIX, `${RED}ERROR${RESET}`, ...args);
}
