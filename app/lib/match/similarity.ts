/**
 * similarity.ts
 *
 * Token-set fuzzy ratio on a 0..100 scale.
 *
 * Both inputs are normalized and split into word sets. The shared words are
 * compared against each side's full word list, so word order does not matter
 * and one name being a subset of the other scores 100. The pairwise ratio is
 * the Dice bigram coefficient from string-similarity.
 */

import stringSimilarity from "string-similarity";
import { normalize } from "./normalize";

function ratio(a: string, b: string): number {
  if (!a || !b) return 0;
  return Math.round(stringSimilarity.compareTwoStrings(a, b) * 100);
}

function tokenSet(value: string): Set<string> {
  return new Set(normalize(value).split(" ").filter(Boolean));
}

export function similarity(a: string, b: string): number {
  const tokensA = tokenSet(a);
  const tokensB = tokenSet(b);
  if (tokensA.size === 0 || tokensB.size === 0) return 0;

  const shared = [...tokensA].filter((t) => tokensB.has(t)).sort();
  const onlyA = [...tokensA].filter((t) => !tokensB.has(t)).sort();
  const onlyB = [...tokensB].filter((t) => !tokensA.has(t)).sort();

  const sect = shared.join(" ");
  const combinedA = [...shared, ...onlyA].join(" ");
  const combinedB = [...shared, ...onlyB].join(" ");

  return Math.max(
    ratio(sect, combinedA),
    ratio(sect, combinedB),
    ratio(combinedA, combinedB),
  );
}
