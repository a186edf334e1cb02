import { describe, it, expect, beforeEach, afterEach } from "vitest";
import fs from "fs";
import os from "os";
import path from "path";
import { compileLexicon, getMatrixLexicon, loadMatrixLexicon } from "@/lib/analyzer/lexicon";

describe("matrix lexicon", () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), "pa-lexicon-"));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it("loads the shipped lexicon", () => {
    const lexicon = loadMatrixLexicon();

    expect(lexicon.generic.has("method")).toBe(true);
    expect(lexicon.generic.has("方法")).toBe(true);
    expect(lexicon.synonyms.get("cache")).toEqual(["缓存"]);
  });

  it("lower-cases keys and words", () => {
    const lexicon = compileLexicon({ generic: ["Method"], synonyms: { Cache: ["Buffer"] } });

    expect([...lexicon.generic]).toEqual(["method"]);
    expect(lexicon.synonyms.get("cache")).toEqual(["buffer"]);
  });

  it("rejects a malformed file", () => {
    const file = path.join(tempDir, "lexicon.json");
    fs.writeFileSync(file, JSON.stringify({ generic: "method" }), "utf8");

    expect(() => loadMatrixLexicon(file)).toThrow(/^Invalid matrix lexicon .*generic: Expected array, received string/);
  });

  it("caches the module-level lexicon", () => {
    expect(getMatrixLexicon()).toBe(getMatrixLexicon());
  });
});
