/**
 * Merge plan and environment configuration tests.
 *
 * Run: node --import tsx src/config/plan/plan.test.ts
 *
 * Tests cover:
 *   1. Default plan — source table, order, immutability
 *   2. Validation — structured issues for malformed plans
 *   3. Plan files — JSON loading and its failure modes
 *   4. Environment — typed settings and fail-fast parsing
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { ConfigError, loadConfig } from "../index.js";
import {
  DEFAULT_MERGE_PLAN,
  loadMergePlan,
  loadMergePlanFile,
  MergePlanError,
  sourceLabel,
  SUPPLEMENTARY_FILES,
  validateMergePlan,
} from "./index.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

/**
 * Run fn with the given environment variables, restoring them afterwards.
 * An undefined value unsets the variable.
 */
function withEnv(vars: Record<string, string | undefined>, fn: () => void): void {
  const saved = new Map<string, string | undefined>();
  for (const [key, value] of Object.entries(vars)) {
    saved.set(key, process.env[key]);
    if (value === undefined) {
      delete process.env[key];
    } else {
      process.env[key] = value;
    }
  }
  try {
    fn();
  } finally {
    for (const [key, value] of saved) {
      if (value === undefined) {
        delete process.env[key];
      } else {
        process.env[key] = value;
      }
    }
  }
}

function planIssues(input: unknown): { path: string; code: string; message: string }[] {
  try {
    loadMergePlan(input);
  } catch (err) {
    if (err instanceof MergePlanError) {
      return err.issues.map((i) => ({
        path: i.path.join("."),
        code: i.code,
        message: i.message,
      }));
    }
    throw err;
  }
  throw new Error("expected MergePlanError");
}

const tempRoot = mkdtempSync(join(tmpdir(), "merge-plan-test-"));

const CONFIG_VARS = [
  "NODE_ENV",
  "LOG_LEVEL",
  "LOG_DIR",
  "LOG_TO_FILE",
  "DICTIONARY_DIR",
  "OUTPUT_FILE",
  "ALLOW_MISSING_SOURCES",
];

const UNSET_CONFIG: Record<string, string | undefined> = {};
for (const key of CONFIG_VARS) {
  UNSET_CONFIG[key] = undefined;
}

// ═══════════════════════════════════════════════════════════════════════════
// DEFAULT PLAN
// ═══════════════════════════════════════════════════════════════════════════

section("Default plan");

test("seeds from the base dictionary without filtering", () => {
  const plan = loadMergePlan(DEFAULT_MERGE_PLAN);
  assert.deepEqual(plan.sources[0], {
    file: "short_dictionary.txt",
    policy: "unconditional",
  });
  assert.equal(plan.output, "new_short_dictionary.txt");
});

test("filters the nine supplementary lists in their fixed order", () => {
  const plan = loadMergePlan(DEFAULT_MERGE_PLAN);
  const supplementary = plan.sources.slice(1);
  assert.deepEqual(
    supplementary.map((s) => s.file),
    [
      "5000-more-common.txt",
      "globish.txt",
      "simplified_english.txt",
      "special_english.txt",
      "basic_english_850.txt",
      "basic_english_2000.txt",
      "doublet_words.txt",
      "unique_grams.txt",
      "200-less-common.txt",
    ]
  );
  assert.equal(SUPPLEMENTARY_FILES.length, 9);
  assert.ok(supplementary.every((s) => s.policy === "length_and_alphabetic"));
});

test("loaded plans are deeply frozen", () => {
  const plan = loadMergePlan(DEFAULT_MERGE_PLAN);
  assert.equal(Object.isFrozen(plan), true);
  assert.equal(Object.isFrozen(plan.sources), true);
  assert.equal(Object.isFrozen(plan.sources[3]), true);
});

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════

section("Validation");

test("rejects a plan without sources", () => {
  const issues = planIssues({ sources: [], output: "out.txt" });
  assert.deepEqual(issues.map((i) => [i.path, i.code]), [["sources", "too_small"]]);
});

test("rejects an unknown policy", () => {
  const issues = planIssues({
    sources: [{ file: "a.txt", policy: "everything" }],
    output: "out.txt",
  });
  assert.deepEqual(issues.map((i) => [i.path, i.code]), [
    ["sources.0.policy", "invalid_enum_value"],
  ]);
});

test("rejects unknown keys on a source", () => {
  const issues = planIssues({
    sources: [{ file: "a.txt", policy: "unconditional", minLength: 3 }],
    output: "out.txt",
  });
  assert.deepEqual(issues.map((i) => [i.path, i.code]), [["sources.0", "unrecognized_keys"]]);
});

test("rejects duplicate source files", () => {
  const issues = planIssues({
    sources: [
      { file: "a.txt", policy: "unconditional" },
      { file: "b.txt", policy: "length_and_alphabetic" },
      { file: "a.txt", policy: "length_and_alphabetic" },
    ],
    output: "out.txt",
  });
  assert.deepEqual(issues, [
    {
      path: "sources.2.file",
      code: "custom",
      message: 'Duplicate source "a.txt" (first listed at index 0)',
    },
  ]);
});

test("rejects an output that overwrites a source", () => {
  const issues = planIssues({
    sources: [{ file: "a.txt", policy: "unconditional" }],
    output: "a.txt",
  });
  assert.deepEqual(issues.map((i) => [i.path, i.code]), [["output", "custom"]]);
});

test("compares source and output paths after normalizing", () => {
  const issues = planIssues({
    sources: [
      { file: "base.txt", policy: "unconditional" },
      { file: "lists/../base.txt", policy: "length_and_alphabetic" },
    ],
    output: "./base.txt",
  });
  assert.deepEqual(issues.map((i) => [i.path, i.code]), [
    ["sources.1.file", "custom"],
    ["output", "custom"],
  ]);
});

test("MergePlanError.format lists every issue", () => {
  try {
    loadMergePlan({
      sources: [
        { file: "a.txt", policy: "unconditional" },
        { file: "a.txt", policy: "unconditional" },
      ],
      output: "out.txt",
    });
    assert.fail("expected MergePlanError");
  } catch (err) {
    assert.ok(err instanceof MergePlanError);
    assert.equal(
      err.format(),
      'Merge plan validation failed:\n  - sources.1.file: Duplicate source "a.txt" (first listed at index 0)'
    );
  }
});

test("validateMergePlan reports without throwing", () => {
  const bad = validateMergePlan({ output: "out.txt" });
  assert.equal(bad.success, false);
  assert.deepEqual(bad.errors?.map((e) => e.path), [["sources"]]);

  const good = validateMergePlan(DEFAULT_MERGE_PLAN);
  assert.equal(good.success, true);
  assert.equal(good.plan?.sources.length, 10);
});

section("sourceLabel");

test("derives labels from the file name", () => {
  assert.equal(sourceLabel({ file: "lists/globish.txt", policy: "unconditional" }), "globish");
  assert.equal(sourceLabel({ file: "words", policy: "unconditional" }), "words");
  assert.equal(sourceLabel({ file: "archive.tar.gz", policy: "unconditional" }), "archive.tar");
});

test("prefers an explicit label", () => {
  assert.equal(
    sourceLabel({ file: "globish.txt", policy: "unconditional", label: "Globish" }),
    "Globish"
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// PLAN FILES
// ═══════════════════════════════════════════════════════════════════════════

section("Plan files");

test("loads a plan from JSON", () => {
  const path = join(tempRoot, "plan.json");
  writeFileSync(
    path,
    JSON.stringify({
      sources: [
        { file: "base.txt", policy: "unconditional" },
        { file: "extra.txt", policy: "length_and_alphabetic", label: "extras" },
      ],
      output: "merged.txt",
    })
  );
  const plan = loadMergePlanFile(path);
  assert.equal(plan.sources.length, 2);
  assert.equal(plan.sources[1]?.label, "extras");
  assert.equal(plan.output, "merged.txt");
});

test("malformed JSON is reported as invalid_json", () => {
  const path = join(tempRoot, "broken.json");
  writeFileSync(path, "{ sources: ");
  assert.throws(
    () => loadMergePlanFile(path),
    (err: unknown) =>
      err instanceof MergePlanError && err.issues[0]?.code === "invalid_json"
  );
});

test("a missing plan file is reported as unreadable", () => {
  assert.throws(
    () => loadMergePlanFile(join(tempRoot, "absent.json")),
    (err: unknown) =>
      err instanceof MergePlanError && err.issues[0]?.code === "unreadable"
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// ENVIRONMENT
// ═══════════════════════════════════════════════════════════════════════════

section("Environment");

test("defaults when nothing is set", () => {
  withEnv(UNSET_CONFIG, () => {
    assert.deepEqual(loadConfig(), {
      env: "development",
      logLevel: "info",
      logDir: "output/logs",
      logToFile: true,
      dictionaryDir: "dictionaries",
      outputFile: undefined,
      allowMissingSources: false,
    });
  });
});

test("reads overrides", () => {
  withEnv(
    {
      ...UNSET_CONFIG,
      NODE_ENV: "test",
      LOG_LEVEL: "debug",
      LOG_TO_FILE: "no",
      DICTIONARY_DIR: "/data/words",
      OUTPUT_FILE: "/data/out.txt",
      ALLOW_MISSING_SOURCES: "YES",
    },
    () => {
      const config = loadConfig();
      assert.equal(config.env, "test");
      assert.equal(config.logLevel, "debug");
      assert.equal(config.logToFile, false);
      assert.equal(config.dictionaryDir, "/data/words");
      assert.equal(config.outputFile, "/data/out.txt");
      assert.equal(config.allowMissingSources, true);
    }
  );
});

test("empty values fall back to defaults", () => {
  withEnv({ ...UNSET_CONFIG, OUTPUT_FILE: "", DICTIONARY_DIR: "" }, () => {
    const config = loadConfig();
    assert.equal(config.outputFile, undefined);
    assert.equal(config.dictionaryDir, "dictionaries");
  });
});

test("an unknown log level fails fast", () => {
  withEnv({ ...UNSET_CONFIG, LOG_LEVEL: "verbose" }, () => {
    assert.throws(
      () => loadConfig(),
      (err: unknown) =>
        err instanceof ConfigError &&
        err.message === "Invalid LOG_LEVEL: verbose. Must be one of: debug, info, warn, error."
    );
  });
});

test("a malformed boolean fails fast", () => {
  withEnv({ ...UNSET_CONFIG, ALLOW_MISSING_SOURCES: "maybe" }, () => {
    assert.throws(() => loadConfig(), ConfigError);
  });
});

// ═══════════════════════════════════════════════════════════════════════════
// CLEANUP & SUMMARY
// ═══════════════════════════════════════════════════════════════════════════

rmSync(tempRoot, { recursive: true, force: true });

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
