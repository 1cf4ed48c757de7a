/**
 * Blind peer ranking: label assignment, ranking-protocol parsing and rank
 * aggregation.
 *
 * Protocol expected from each advisor (best first):
 *
 *   FINAL RANKING:
 *   1. Response C
 *   2. Response A
 */

import type {
  AdvisorResponse,
  AggregateRankingEntry,
  Label,
  LabelMap,
  RankingEntry,
} from './types.js';

export const RANKING_HEADER = 'FINAL RANKING:';
const LABEL_PREFIX = 'Response';

// ── Labels ──

/** 0 → "A", 25 → "Z", 26 → "AA", … */
export function labelLetters(index: number): string {
  let n = index + 1;
  let letters = '';
  while (n > 0) {
    const rem = (n - 1) % 26;
    letters = String.fromCharCode(65 + rem) + letters;
    n = Math.floor((n - 1) / 26);
  }
  return letters;
}

export function labelFor(index: number): Label {
  return `${LABEL_PREFIX} ${labelLetters(index)}`;
}

/**
 * Assign sequential labels to responses in the order given.
 */
export function buildLabelMap(responses: readonly AdvisorResponse[]): LabelMap {
  const map: LabelMap = {};
  responses.forEach((r, i) => {
    map[labelFor(i)] = { advisor: r.advisor, model: r.model };
  });
  return map;
}

// ── Parsing ──

// `1. Response B`, `2) **Response A**`, `3. Response C — concise`
const ITEM_PATTERN = /^\s*\d+\s*[.)]\s*(?:\*\*)?Response\s+([A-Z]+)\b/;

function parseItem(line: string): Label | null {
  const m = ITEM_PATTERN.exec(line);
  return m ? `${LABEL_PREFIX} ${m[1]}` : null;
}

/**
 * Read numbered items starting right after a header occurrence. Blank lines
 * are skipped; the first non-blank line that is not an item ends the list.
 * Position in the list is the rank; the written numbers are not trusted.
 */
function readItems(text: string, headerEnd: number): Label[] {
  const lines = text.slice(headerEnd).split('\n');
  const labels: Label[] = [];
  const seen = new Set<Label>();

  for (const [i, line] of lines.entries()) {
    if (line.trim() === '') continue;
    const label = parseItem(line);
    if (!label) {
      // Text sharing the header line is not an item; let the list start below it
      if (i === 0 && labels.length === 0) continue;
      break;
    }
    if (!seen.has(label)) {
      seen.add(label);
      labels.push(label);
    }
  }
  return labels;
}

/**
 * Parse an advisor's evaluation into an ordered label sequence.
 *
 * Locates the last header occurrence that is followed by at least one item,
 * since evaluations sometimes mention the header in prose before the actual
 * ranking. No header, or no items after any header, yields [].
 */
export function parseRanking(text: string): Label[] {
  const normalized = text.replace(/\r\n?/g, '\n');
  let from = normalized.length;

  while (from >= 0) {
    const idx = normalized.lastIndexOf(RANKING_HEADER, from);
    if (idx === -1) break;
    const labels = readItems(normalized, idx + RANKING_HEADER.length);
    if (labels.length > 0) return labels;
    from = idx - 1;
  }
  return [];
}

// ── Aggregation ──

/**
 * Turn per-advisor label rankings into per-participant average positions.
 *
 * Pure: depends only on its arguments. Labels missing from `labelMap` are
 * ignored. Participants nobody ranked get no entry. Ties keep label order,
 * which is Stage-1 order (Array.prototype.sort is stable).
 */
export function aggregateRankings(
  rankings: readonly RankingEntry[],
  labelMap: LabelMap,
): AggregateRankingEntry[] {
  const positions = new Map<Label, number[]>();

  for (const entry of rankings) {
    entry.parsedRanking.forEach((label, i) => {
      if (!Object.hasOwn(labelMap, label)) return;
      const list = positions.get(label) ?? [];
      list.push(i + 1); // 1-indexed rank
      positions.set(label, list);
    });
  }

  const aggregates: AggregateRankingEntry[] = [];
  for (const [label, participant] of Object.entries(labelMap)) {
    const ranks = positions.get(label);
    if (!ranks || ranks.length === 0) continue;
    const mean = ranks.reduce((a, b) => a + b, 0) / ranks.length;
    aggregates.push({
      advisor: participant.advisor,
      model: participant.model,
      averageRank: Math.round(mean * 100) / 100,
      votes: ranks.length,
    });
  }

  return aggregates.sort((a, b) => a.averageRank - b.averageRank);
}
