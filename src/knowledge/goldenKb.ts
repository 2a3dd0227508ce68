import fs from "node:fs";
import { z } from "zod";
import type { KnowledgeEntry, MatchResult } from "../types";
import { describeError } from "../errors";

export const DEFAULT_MATCH_THRESHOLD = 0.65;
export const SUBSTRING_BOOST = 0.8;

const GoldenKbFileSchema = z.object({
  entries: z.array(
    z.object({
      id: z.string().min(1),
      questions: z.array(z.string()),
      answer: z.string().min(1)
    })
  )
});

/**
 * Ratcliff/Obershelp similarity: twice the number of characters in matching
 * blocks over the combined length. Two empty strings are identical.
 */
export function similarityRatio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) {
    return 1;
  }
  return (2 * countMatchingCharacters(a, b)) / total;
}

function countMatchingCharacters(a: string, b: string): number {
  const positions = new Map<string, number[]>();
  for (let j = 0; j < b.length; j += 1) {
    const list = positions.get(b[j]);
    if (list) {
      list.push(j);
    } else {
      positions.set(b[j], [j]);
    }
  }

  let matched = 0;
  const pending: Array<[number, number, number, number]> = [[0, a.length, 0, b.length]];
  while (pending.length > 0) {
    const next = pending.pop();
    if (!next) break;
    const [alo, ahi, blo, bhi] = next;
    const [i, j, size] = longestMatch(a, positions, alo, ahi, blo, bhi);
    if (size === 0) {
      continue;
    }
    matched += size;
    if (alo < i && blo < j) {
      pending.push([alo, i, blo, j]);
    }
    if (i + size < ahi && j + size < bhi) {
      pending.push([i + size, ahi, j + size, bhi]);
    }
  }
  return matched;
}

function longestMatch(
  a: string,
  positions: Map<string, number[]>,
  alo: number,
  ahi: number,
  blo: number,
  bhi: number
): [number, number, number] {
  let bestI = alo;
  let bestJ = blo;
  let bestSize = 0;
  let runs = new Map<number, number>();

  for (let i = alo; i < ahi; i += 1) {
    const nextRuns = new Map<number, number>();
    for (const j of positions.get(a[i]) ?? []) {
      if (j < blo) continue;
      if (j >= bhi) break;
      const size = (runs.get(j - 1) ?? 0) + 1;
      nextRuns.set(j, size);
      if (size > bestSize) {
        bestI = i - size + 1;
        bestJ = j - size + 1;
        bestSize = size;
      }
    }
    runs = nextRuns;
  }

  return [bestI, bestJ, bestSize];
}

export class GoldenKnowledgeBase {
  private readonly entries: readonly KnowledgeEntry[];

  constructor(entries: readonly KnowledgeEntry[]) {
    this.entries = entries.map((entry) => Object.freeze({ ...entry, questions: Object.freeze([...entry.questions]) }));
  }

  /**
   * Reads the curated set from disk. An unreadable or malformed file yields an
   * empty base so every query falls through to the pipeline.
   */
  static fromFile(filePath: string): GoldenKnowledgeBase {
    try {
      const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
      const parsed = GoldenKbFileSchema.safeParse(raw);
      if (!parsed.success) {
        console.warn(`Golden KB at ${filePath} is malformed; continuing without curated answers.`);
        return new GoldenKnowledgeBase([]);
      }
      console.log(`Golden KB loaded ${parsed.data.entries.length} entries`);
      return new GoldenKnowledgeBase(parsed.data.entries);
    } catch (error) {
      console.warn(`Golden KB could not be read from ${filePath}`, describeError(error));
      return new GoldenKnowledgeBase([]);
    }
  }

  get size(): number {
    return this.entries.length;
  }

  findBestMatch(query: string, threshold = DEFAULT_MATCH_THRESHOLD): MatchResult | null {
    const normalizedQuery = query.trim().toLowerCase();
    if (normalizedQuery.length === 0) {
      return null;
    }

    let bestEntry: KnowledgeEntry | null = null;
    let bestScore = 0;

    for (const entry of this.entries) {
      for (const question of entry.questions) {
        const normalizedQuestion = question.trim().toLowerCase();
        if (normalizedQuestion.length === 0) {
          continue;
        }

        let score = similarityRatio(normalizedQuery, normalizedQuestion);
        if (normalizedQuery.includes(normalizedQuestion) || normalizedQuestion.includes(normalizedQuery)) {
          score = Math.max(score, SUBSTRING_BOOST);
        }

        if (score > bestScore) {
          bestScore = score;
          bestEntry = entry;
        }
      }
    }

    if (bestEntry && bestScore >= threshold) {
      console.log(`Golden KB match ${bestEntry.id} (score ${bestScore.toFixed(2)})`);
      return { entry: bestEntry, confidence: bestScore };
    }

    return null;
  }
}
