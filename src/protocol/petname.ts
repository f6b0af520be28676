/**
 * Deterministic adjective-noun labels for DIDs.
 *
 * Cosmetic only: 64 x 64 = 4096 labels, so collisions are expected. Never
 * use a petname to identify or authenticate anyone.
 */

import { createHash } from "node:crypto";
import { readFileSync } from "node:fs";
import { z } from "zod";

const WordListsSchema = z.object({
  adjectives: z.array(z.string().min(1)).length(64),
  nouns: z.array(z.string().min(1)).length(64),
});

export type WordLists = z.infer<typeof WordListsSchema>;

let cached: WordLists | null = null;

/** Load the word lists shipped in data/petname-words.json. */
export function petnameWords(): WordLists {
  if (cached === null) {
    const url = new URL("../../data/petname-words.json", import.meta.url);
    cached = WordListsSchema.parse(JSON.parse(readFileSync(url, "utf-8")));
  }
  return cached;
}

/**
 * Generate a deterministic `adjective-noun` label from a DID.
 */
export function petnameFromDid(did: string): string {
  const { adjectives, nouns } = petnameWords();
  const h = createHash("sha256").update(did, "utf-8").digest();
  return `${adjectives[h[0] % adjectives.length]}-${nouns[h[1] % nouns.length]}`;
}
