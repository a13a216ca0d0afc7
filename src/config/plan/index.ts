/**
 * Merge plan module.
 *
 * Usage:
 *   import { loadMergePlan, DEFAULT_MERGE_PLAN } from "./config/plan/index.js";
 *
 *   const plan = loadMergePlan(DEFAULT_MERGE_PLAN);
 *
 *   const trimmed = loadMergePlan({
 *     ...DEFAULT_MERGE_PLAN,
 *     sources: DEFAULT_MERGE_PLAN.sources.slice(0, 3),
 *   });
 */

export { AcceptancePolicy, MissingSourceMode } from "./enums.js";

export type { MergePlan, SourceEntry } from "./schema.js";
export { MergePlanSchema, SourceEntrySchema } from "./schema.js";

export {
  loadMergePlan,
  loadMergePlanFile,
  validateMergePlan,
  sourceLabel,
  MergePlanError,
  type PlanValidationIssue,
} from "./loader.js";

export {
  DEFAULT_MERGE_PLAN,
  BASE_DICTIONARY_FILE,
  MERGED_DICTIONARY_FILE,
  SUPPLEMENTARY_FILES,
} from "./defaults.js";
