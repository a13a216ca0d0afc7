/**
 * Merge plan schema definition.
 *
 * A merge plan is the ordered table of word lists that feed the combined
 * dictionary. The first source seeds the merged set; every later source can
 * only add to it. Order changes progress reporting, never the final set.
 */

import { normalize } from "node:path";
import { z } from "zod";
import { AcceptancePolicy } from "./enums.js";

/**
 * One word list and the policy applied to its lines.
 */
export const SourceEntrySchema = z
  .object({
    /** Path to the word list, relative to the dictionary directory */
    file: z
      .string()
      .min(1)
      .describe("Word list file, one word or phrase per line"),

    policy: AcceptancePolicy.describe(
      "Acceptance policy for normalized lines from this file"
    ),

    /** Name used in progress output; defaults to the file's base name */
    label: z
      .string()
      .min(1)
      .optional()
      .describe("Display name for progress reporting"),
  })
  .strict();

export type SourceEntry = z.infer<typeof SourceEntrySchema>;

export const MergePlanSchema = z
  .object({
    sources: z
      .array(SourceEntrySchema)
      .min(1)
      .describe("Word lists in processing order; the first seeds the set"),

    output: z
      .string()
      .min(1)
      .describe("Path of the combined dictionary"),
  })
  .strict()
  .superRefine((plan, ctx) => {
    const seen = new Map<string, number>();
    plan.sources.forEach((source, index) => {
      const key = normalize(source.file);
      const firstIndex = seen.get(key);
      if (firstIndex !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["sources", index, "file"],
          message: `Duplicate source "${source.file}" (first listed at index ${firstIndex})`,
        });
      } else {
        seen.set(key, index);
      }
    });

    // Compared as written; runMerge repeats the check on resolved paths
    if (seen.has(normalize(plan.output))) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["output"],
        message: `Output "${plan.output}" would overwrite one of the sources`,
      });
    }
  });

export type MergePlan = z.infer<typeof MergePlanSchema>;
