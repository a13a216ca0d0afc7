/**
 * Enumerations for merge plan configuration.
 */

import { z } from "zod";

/**
 * How words read from a source are admitted into the merged dictionary.
 *
 *   unconditional         - every normalized line is kept (trusted base list)
 *   length_and_alphabetic - only words longer than four letters made of A-Z
 */
export const AcceptancePolicy = z.enum([
  "unconditional",
  "length_and_alphabetic",
]);
export type AcceptancePolicy = z.infer<typeof AcceptancePolicy>;

/**
 * What to do when a supplementary word list does not exist.
 */
export const MissingSourceMode = z.enum(["fail", "warn"]);
export type MissingSourceMode = z.infer<typeof MissingSourceMode>;
