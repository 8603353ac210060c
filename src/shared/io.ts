import { readFile } from "node:fs/promises";

/**
 * Outcome of reading a JSON file into a typed value. `missing` covers any
 * read failure; `invalid` means the file was read but did not parse or did
 * not pass the guard.
 */
export type JsonReadResult<T> =
  | { status: "ok"; value: T }
  | { status: "missing" }
  | { status: "invalid"; reason: "syntax" | "shape" };

export async function readTextFile(filePath: string): Promise<string | undefined> {
  try {
    return await readFile(filePath, "utf-8");
  } catch {
    return undefined;
  }
}

export async function readJsonAs<T>(
  filePath: string,
  guard: (value: unknown) => value is T,
): Promise<JsonReadResult<T>> {
  const raw = await readTextFile(filePath);
  if (raw === undefined) return { status: "missing" };

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return { status: "invalid", reason: "syntax" };
  }

  return guard(parsed) ? { status: "ok", value: parsed } : { status: "invalid", reason: "shape" };
}
