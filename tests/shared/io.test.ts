import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import { readJsonAs, readTextFile } from "../../src/shared/io.js";

interface Point {
  x: number;
}

function isPoint(value: unknown): value is Point {
  return typeof value === "object" && value !== null && typeof Reflect.get(value, "x") === "number";
}

function tempFile(name: string, content: string): string {
  const dir = mkdtempSync(join(tmpdir(), "calc-io-"));
  const path = join(dir, name);
  writeFileSync(path, content, "utf-8");
  return path;
}

describe("readTextFile", () => {
  it("reads a text file", async () => {
    const path = tempFile("note.txt", "hello");
    expect(await readTextFile(path)).toBe("hello");
  });

  it("returns undefined for a missing file", async () => {
    expect(await readTextFile(join(tmpdir(), "calc-missing", "x.txt"))).toBeUndefined();
  });
});

describe("readJsonAs", () => {
  it("returns the value when it passes the guard", async () => {
    const path = tempFile("point.json", '{"x":1}');
    expect(await readJsonAs(path, isPoint)).toEqual({ status: "ok", value: { x: 1 } });
  });

  it("reports a missing file", async () => {
    expect(await readJsonAs(join(tmpdir(), "calc-missing", "p.json"), isPoint)).toEqual({ status: "missing" });
  });

  it("reports unparseable JSON", async () => {
    const path = tempFile("bad.json", "{");
    expect(await readJsonAs(path, isPoint)).toEqual({ status: "invalid", reason: "syntax" });
  });

  it("reports JSON of the wrong shape", async () => {
    const path = tempFile("wrong.json", '{"x":"one"}');
    expect(await readJsonAs(path, isPoint)).toEqual({ status: "invalid", reason: "shape" });
  });
});
