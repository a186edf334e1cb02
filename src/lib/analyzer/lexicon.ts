/**
 * Matrix Lexicon
 *
 * Generic words dropped from feature tokens and the bilingual (CN/EN)
 * synonym table used to widen them. Loaded once from
 * configs/matrix-lexicon.json.
 *
 * @module analyzer/lexicon
 */

import * as fs from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { formatIssues } from "../config-schemas";

export const MatrixLexiconFileSchema = z.object({
  generic: z.array(z.string().min(1)),
  synonyms: z.record(z.array(z.string().min(1))),
});

export type MatrixLexiconFile = z.infer<typeof MatrixLexiconFileSchema>;

export interface MatrixLexicon {
  generic: ReadonlySet<string>;
  synonyms: ReadonlyMap<string, readonly string[]>;
}

const DEFAULT_LEXICON_PATH = fileURLToPath(new URL("../../../configs/matrix-lexicon.json", import.meta.url));

/**
 * Build a lexicon from file content. Keys and words are lower-cased.
 */
export function compileLexicon(content: MatrixLexiconFile): MatrixLexicon {
  return {
    generic: new Set(content.generic.map((w) => w.toLowerCase())),
    synonyms: new Map(
      Object.entries(content.synonyms).map(([k, v]) => [k.toLowerCase(), v.map((s) => s.toLowerCase())]),
    ),
  };
}

export function loadMatrixLexicon(filePath: string = DEFAULT_LEXICON_PATH): MatrixLexicon {
  const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  const parsed = MatrixLexiconFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new Error(`Invalid matrix lexicon ${filePath}: ${formatIssues(parsed.error.issues).join("; ")}`);
  }
  return compileLexicon(parsed.data);
}

/**
 * Module-level lexicon (loaded on first use)
 */
let _lexicon: MatrixLexicon | null = null;

export function getMatrixLexicon(): MatrixLexicon {
  if (!_lexicon) {
    _lexicon = loadMatrixLexicon();
  }
  return _lexicon;
}
