/**
 * Security policy documents
 *
 * A policy is plain data validated with zod. It is passed to every validation call;
 * nothing in the engine holds a global "current policy".
 */

import { z } from "zod";
import { builtinDeniedFunctions, builtinDeniedModules } from "../analysis/catalog";
import { formatIssues } from "../config";
import { PolicyConfigError } from "../errors";
import { Language } from "../types";

const MiB = 1024 * 1024;

export const DEFAULT_RESOURCE_LIMITS = {
  maxMemoryBytes: 512 * MiB,
  maxCpuSeconds: 30,
  maxComplexity: 50,
  maxNestingDepth: 10,
} as const;

const ResourceLimitsSchema = z.object({
  maxMemoryBytes: z.number().int().positive().default(DEFAULT_RESOURCE_LIMITS.maxMemoryBytes),
  maxCpuSeconds: z.number().positive().default(DEFAULT_RESOURCE_LIMITS.maxCpuSeconds),
  maxComplexity: z.number().int().positive().default(DEFAULT_RESOURCE_LIMITS.maxComplexity),
  maxNestingDepth: z.number().int().positive().default(DEFAULT_RESOURCE_LIMITS.maxNestingDepth),
});

const RuleTogglesSchema = z.object({
  deniedModule: z.boolean().default(true),
  moduleNotAllowlisted: z.boolean().default(true),
  deniedFunction: z.boolean().default(true),
  filesystemAccess: z.boolean().default(true),
  networkAccess: z.boolean().default(true),
  processSpawn: z.boolean().default(true),
  dynamicCode: z.boolean().default(true),
  sandboxEscape: z.boolean().default(true),
  memoryLimit: z.boolean().default(true),
  cpuLimit: z.boolean().default(true),
  complexityLimit: z.boolean().default(true),
  nestingLimit: z.boolean().default(true),
  recursion: z.boolean().default(true),
  unboundedLoop: z.boolean().default(true),
});

const NameListSchema = z.array(z.string().min(1));

/**
 * One list for every language, or one per language family (`javascript` covers TypeScript)
 */
const LanguageListsSchema = z.union([
  NameListSchema,
  z.object({ python: NameListSchema.default([]), javascript: NameListSchema.default([]) }).strict(),
]);

export const RejectionThresholdSchema = z.enum(["low", "medium", "high", "critical", "any"]);

export const SecurityPolicySchema = z
  .object({
    policyId: z.string().min(1),
    name: z.string().optional(),
    version: z.string().min(1),
    allowedModules: NameListSchema.default([]),
    deniedModules: LanguageListsSchema.default(() => ({
      python: builtinDeniedModules("python"),
      javascript: builtinDeniedModules("javascript"),
    })),
    /** Call names; `*` matches any run of characters */
    deniedFunctions: LanguageListsSchema.default(() => ({
      python: builtinDeniedFunctions("python"),
      javascript: builtinDeniedFunctions("javascript"),
    })),
    resourceLimits: ResourceLimitsSchema.default({}),
    allowRecursion: z.boolean().default(false),
    allowUnboundedLoops: z.boolean().default(true),
    /** Reject any import that is not on the allowlist */
    restrictToAllowedModules: z.boolean().default(false),
    /** Overrides the engine's temp prefixes for file-system literals */
    tempPathPrefixes: z.array(z.string().startsWith("/")).min(1).optional(),
    rules: RuleTogglesSchema.default({}),
    /** Lowest violation severity that rejects; "any" rejects on every violation */
    rejectionThreshold: RejectionThresholdSchema.default("high"),
  })
  .strict();

export type SecurityPolicy = z.infer<typeof SecurityPolicySchema>;
export type SecurityPolicyInput = z.input<typeof SecurityPolicySchema>;
export type RejectionThreshold = z.infer<typeof RejectionThresholdSchema>;
export type RuleToggles = z.infer<typeof RuleTogglesSchema>;
export type LanguageLists = z.infer<typeof LanguageListsSchema>;

/**
 * The entries of a deny list that apply to submissions in `language`
 */
export function listForLanguage(lists: LanguageLists, language: Language): readonly string[] {
  if (Array.isArray(lists)) return lists;
  return language === "python" ? lists.python : lists.javascript;
}

/**
 * Validate an untrusted policy document. Throws PolicyConfigError listing every problem.
 */
export function parsePolicy(input: unknown): SecurityPolicy {
  const parsed = SecurityPolicySchema.safeParse(input);
  if (!parsed.success) {
    throw new PolicyConfigError(formatIssues(parsed.error), { issues: parsed.error.issues });
  }
  return parsed.data;
}

export function createPolicy(input: SecurityPolicyInput): SecurityPolicy {
  return parsePolicy(input);
}

export function createDefaultPolicy(overrides: Partial<SecurityPolicyInput> = {}): SecurityPolicy {
  return parsePolicy({ policyId: "default", name: "Default policy", version: "1", ...overrides });
}

/**
 * Same denylists, but recursion is allowed and the complexity ceiling is doubled
 */
export function createPermissivePolicy(overrides: Partial<SecurityPolicyInput> = {}): SecurityPolicy {
  return parsePolicy({
    policyId: "permissive",
    name: "Permissive policy",
    version: "1",
    allowRecursion: true,
    resourceLimits: { maxComplexity: 100 },
    ...overrides,
  });
}

/**
 * Identity recorded in `policyVersionEvaluated`. Any change here marks cached verdicts stale.
 */
export function policyFingerprint(policy: Pick<SecurityPolicy, "policyId" | "version">): string {
  return `${policy.policyId}@${policy.version}`;
}
