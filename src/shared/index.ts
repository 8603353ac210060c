export { devLog, devWarn, devError } from "./debug-log.js";
export { readTextFile, readJsonAs, type JsonReadResult } from "./io.js";
