import { z } from "zod";
import { ExecutionResult, FailOutcome, FailureCategory, Outcome, SandboxRunResult, StructuredCounts } from "../types";
import { ParseResult, parseJsonObjectChain } from "../utils/json";

export const PASS_SENTINEL = "ALL TESTS PASSED";

const formattingSignatures = [
  /SyntaxError/,
  /IndentationError/,
  /TabError/,
  /ImportError/,
  /ModuleNotFoundError/,
  /Cannot find module/,
  /Unexpected token/
];

const categorySignatures: Array<{ category: FailureCategory; patterns: RegExp[] }> = [
  {
    category: "environment",
    patterns: [/ConnectionError/, /ECONNREFUSED/, /ETIMEDOUT/, /Timeout/i, /\b429\b/, /rate limit/i, /Too Many Requests/i]
  },
  {
    category: "api_mismatch",
    patterns: [/\b404\b/, /\b405\b/, /Not Found/i, /Bad Request/i, /unexpected response/i, /schema/i]
  },
  {
    category: "logic",
    patterns: [/AttributeError/, /KeyError/, /TypeError/, /ValueError/, /IndexError/, /AssertionError/, /NameError/]
  }
];

const harnessResultSchema = z.object({
  tests_passed: z.number().int().min(0),
  tests_failed: z.number().int().min(0),
  errors: z
    .array(z.union([z.string(), z.object({ error: z.string().optional(), test: z.string().optional() }).passthrough()]))
    .default([])
});

const fail = (category: FailureCategory, message: string, rawErrors: string[] = []): FailOutcome => ({
  kind: "fail",
  category,
  message,
  rawErrors
});

const matchesAny = (text: string, patterns: RegExp[]): boolean => patterns.some((pattern) => pattern.test(text));

export const categorizeErrors = (errors: string[]): FailureCategory => {
  const joined = errors.join("\n");
  for (const { category, patterns } of categorySignatures) {
    if (matchesAny(joined, patterns)) return category;
  }
  return "unknown";
};

const parseResultBlock = (stdout: string): ParseResult<{ counts: StructuredCounts; errors: string[] }> => {
  const start = stdout.indexOf("JSON_RESULT_START");
  const end = stdout.indexOf("JSON_RESULT_END");
  if (start === -1 || end <= start) {
    return { kind: "unparseable", raw: stdout };
  }

  const block = parseJsonObjectChain(stdout.slice(start + "JSON_RESULT_START".length, end));
  if (block.kind === "unparseable") return block;

  const result = harnessResultSchema.safeParse(block.value);
  if (!result.success) {
    return { kind: "unparseable", raw: stdout };
  }

  return {
    kind: "parsed",
    value: {
      counts: { passed: result.data.tests_passed, failed: result.data.tests_failed },
      errors: result.data.errors.map((item) => {
        if (typeof item === "string") return item;
        const message = item.error ?? "Unknown error";
        return item.test ? `${item.test}: ${message}` : message;
      })
    }
  };
};

const parseCountLines = (stdout: string): ParseResult<StructuredCounts> => {
  const passed = /Tests Passed:\s*(\d+)/.exec(stdout);
  const failed = /Tests Failed:\s*(\d+)/.exec(stdout);
  if (!passed && !failed) {
    return { kind: "unparseable", raw: stdout };
  }
  return {
    kind: "parsed",
    value: {
      passed: passed ? Number.parseInt(passed[1], 10) : 0,
      failed: failed ? Number.parseInt(failed[1], 10) : 0
    }
  };
};

/**
 * Derives test counts and raw error lines from what the harness printed: a
 * `JSON_RESULT_START`/`JSON_RESULT_END` block first, `Tests Passed:`/`Tests Failed:` lines second.
 */
export const parseSandboxOutput = (run: SandboxRunResult): ExecutionResult => {
  const base = { stdout: run.stdout, exitError: run.exitError, durationSeconds: run.durationSeconds };

  const block = parseResultBlock(run.stdout);
  if (block.kind === "parsed") {
    return { ...base, structuredCounts: block.value.counts, errors: block.value.errors };
  }

  const lines = parseCountLines(run.stdout);
  if (lines.kind === "parsed") {
    return { ...base, structuredCounts: lines.value, errors: [] };
  }

  return { ...base, errors: [] };
};

const classifyUnchecked = (result: ExecutionResult): Outcome => {
  if (result.exitError) {
    const category = matchesAny(result.exitError, formattingSignatures) ? "formatting" : "environment";
    return fail(category, result.exitError, [result.exitError]);
  }

  const counts = result.structuredCounts;
  if (counts && counts.failed === 0 && counts.passed > 0) {
    return { kind: "pass" };
  }

  if (counts && counts.failed > 0) {
    const rawErrors = [...result.errors];
    const total = counts.passed + counts.failed;
    return fail(categorizeErrors(rawErrors), `${counts.failed} of ${total} test(s) failed`, rawErrors);
  }

  if (result.stdout.includes(PASS_SENTINEL)) {
    return { kind: "pass" };
  }

  return fail("unknown", "No test results could be read from the sandbox output.", [...result.errors]);
};

/** Never throws: anything unexpected becomes an `unknown` failure. */
export const classifyExecution = (result: ExecutionResult): Outcome => {
  try {
    return classifyUnchecked(result);
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    return fail("unknown", `Could not classify sandbox output: ${message}`);
  }
};
