/**
 * Claims backend URL candidates
 *
 * Each backend exposes one or more page URLs that may carry the claims of a
 * given publication. Candidates are tried in order, round-robin across the
 * fetch attempts the orchestrator grants a backend.
 *
 * @module claims-backends
 */

import { normalizePatentNumber } from "./source-router";
import type { ClaimsBackend, PriorArtRecord } from "./types";

type UrlCandidateBuilder = (record: Pick<PriorArtRecord, "patent_number" | "url">) => string[];

function dedupe(urls: string[]): string[] {
  return [...new Set(urls)];
}

const buildGoogleCandidates: UrlCandidateBuilder = (record) => {
  const url = (record.url ?? "").trim();
  const pn = normalizePatentNumber(record.patent_number);
  const out: string[] = [];
  if (url.startsWith("https://patents.google.com/")) {
    out.push(url);
  }
  if (pn) {
    out.push(`https://patents.google.com/patent/${pn}`);
    out.push(`https://patents.google.com/patent/${pn}/en`);
    out.push(`https://patents.google.com/patent/${pn}?oq=${pn}`);
  }
  return dedupe(out);
};

const buildEspacenetCandidates: UrlCandidateBuilder = (record) => {
  const pn = normalizePatentNumber(record.patent_number);
  if (!pn) return [];
  const q = encodeURIComponent(`pn=${pn}`);
  return [
    `https://worldwide.espacenet.com/patent/search?q=${q}`,
    `https://worldwide.espacenet.com/patent/search/publication/${pn}`,
  ];
};

const buildCnipaCandidates: UrlCandidateBuilder = (record) => {
  const pn = normalizePatentNumber(record.patent_number);
  if (!pn) return [];
  const q = encodeURIComponent(pn);
  return [
    `https://pss-system.cponline.cnipa.gov.cn/conventionalSearch?searchWord=${q}`,
    `https://pss-system.cponline.cnipa.gov.cn/seniorSearch?searchWord=${q}`,
  ];
};

const buildLensCandidates: UrlCandidateBuilder = (record) => {
  const pn = normalizePatentNumber(record.patent_number);
  if (!pn) return [];
  const q = encodeURIComponent(pn);
  return [
    `https://www.lens.org/lens/search/patent/list?q=${q}`,
    `https://www.lens.org/search/patent/list?q=${q}`,
  ];
};

const URL_BUILDERS: Record<ClaimsBackend, UrlCandidateBuilder> = {
  google: buildGoogleCandidates,
  espacenet: buildEspacenetCandidates,
  cnipa: buildCnipaCandidates,
  lens: buildLensCandidates,
};

export function buildClaimsUrlCandidates(
  record: Pick<PriorArtRecord, "patent_number" | "url">,
  backend: ClaimsBackend,
): string[] {
  return URL_BUILDERS[backend](record);
}
