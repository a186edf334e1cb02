/**
 * Claims Parser
 *
 * Extracts the claims text from a backend page (via cheerio):
 * - `ok`: a designated claims section was found
 * - `ok_fallback`: no section, but the flattened page text has a claims heading
 * - `claims_section_not_found`: neither
 *
 * @module claims-parser
 */

import * as cheerio from "cheerio";
import type { ClaimItem } from "./types";

export const MAX_CLAIMS_TEXT_CHARS = 200000;
export const FALLBACK_WINDOW_CHARS = 40000;
export const DEFAULT_MAX_CLAIMS = 60;

const CLAIMS_SECTION_SELECTORS = ['section[itemprop="claims"]', "section#claims", "section.claims"];

const BLOCK_ELEMENTS = "p, div, li, tr, h1, h2, h3, h4, h5, h6, claim, claim-text";

// "Claim(s)" at a line start, or the CN heading (权利要求书) anywhere
const FALLBACK_HEADING = /(?<=^|\n)claim|权利要求/i;

export type ClaimsParseResult = "ok" | "ok_fallback" | "claims_section_not_found";

export interface ParsedClaims {
  result: ClaimsParseResult;
  text: string;
  claims: ClaimItem[];
}

function normalizeText(raw: string): string {
  return raw
    .replace(/[ \t\r\f\v\u00a0]+/g, " ")
    .replace(/ *\n */g, "\n")
    .replace(/\n{3,}/g, "\n\n")
    .trim();
}

/**
 * Split claims text on "N." numbering. Text without numbering becomes a
 * single claim with num null.
 */
export function splitClaims(text: string, maxClaims: number = DEFAULT_MAX_CLAIMS): ClaimItem[] {
  const trimmed = text.trim();
  if (!trimmed) return [];

  // "2." starts a claim, "2.5" does not
  const marked = `\n${trimmed}`.replace(/(\s)(\d{1,3})\.(?!\d)/g, "\n$2.");
  const parts = marked.split(/\n\s*(\d{1,3})\.(?!\d)/);
  if (parts.length <= 1) {
    return [{ num: null, text: trimmed }];
  }

  const claims: ClaimItem[] = [];
  for (let i = 1; i + 1 < parts.length && claims.length < maxClaims; i += 2) {
    const body = parts[i + 1].trim();
    if (body) {
      claims.push({ num: parts[i], text: body });
    }
  }
  return claims.length > 0 ? claims : [{ num: null, text: trimmed }];
}

/**
 * Claims excerpt from flattened page text: from the first claims heading,
 * at most FALLBACK_WINDOW_CHARS long. Empty when no heading is present.
 */
export function extractClaimsFallback(flatText: string): string {
  if (!flatText) return "";
  const match = FALLBACK_HEADING.exec(flatText);
  if (!match) return "";
  const start = match.index;
  return flatText.slice(start, start + FALLBACK_WINDOW_CHARS).trim();
}

export function parseClaimsHtml(html: string, maxClaims: number = DEFAULT_MAX_CLAIMS): ParsedClaims {
  const $ = cheerio.load(html);
  $("script, style, noscript").remove();
  $("br").replaceWith("\n");
  $(BLOCK_ELEMENTS).append("\n");

  for (const selector of CLAIMS_SECTION_SELECTORS) {
    const section = $(selector).first();
    if (section.length === 0) continue;
    const text = normalizeText(section.text());
    if (text) {
      return {
        result: "ok",
        text: text.slice(0, MAX_CLAIMS_TEXT_CHARS),
        claims: splitClaims(text, maxClaims),
      };
    }
  }

  const fallback = extractClaimsFallback(normalizeText($("body").text()));
  if (fallback) {
    return {
      result: "ok_fallback",
      text: fallback.slice(0, MAX_CLAIMS_TEXT_CHARS),
      claims: splitClaims(fallback, maxClaims),
    };
  }

  return { result: "claims_section_not_found", text: "", claims: [] };
}
