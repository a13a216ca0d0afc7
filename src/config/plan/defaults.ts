/**
 * Default merge plan.
 *
 * The base dictionary is a vetted list and is taken as-is. The supplementary
 * lists are noisier (phrases, abbreviations, fragments), so they only
 * contribute words longer than four letters made of A-Z.
 */

import type { MergePlan } from "./schema.js";

export const BASE_DICTIONARY_FILE = "short_dictionary.txt";

export const MERGED_DICTIONARY_FILE = "new_short_dictionary.txt";

export const SUPPLEMENTARY_FILES: readonly string[] = [
  "5000-more-common.txt",
  "globish.txt",
  "simplified_english.txt",
  "special_english.txt",
  "basic_english_850.txt",
  "basic_english_2000.txt",
  "doublet_words.txt",
  "unique_grams.txt",
  "200-less-common.txt",
];

export const DEFAULT_MERGE_PLAN: MergePlan = {
  sources: [
    { file: BASE_DICTIONARY_FILE, policy: "unconditional" },
    ...SUPPLEMENTARY_FILES.map((file) => ({
      file,
      policy: "length_and_alphabetic" as const,
    })),
  ],
  output: MERGED_DICTIONARY_FILE,
};
