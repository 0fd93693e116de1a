/**
 * Dangerous-primitive catalogs, one per language family
 */

import { z } from "zod";
import { Language } from "../../types";
import { matchesPattern } from "../patterns";
import javascriptCatalog from "./javascript.json";
import pythonCatalog from "./python.json";

const SeveritySchema = z.enum(["low", "medium", "high", "critical"]);

const CallRuleSchema = z.object({
  pattern: z.string().min(1),
  category: z.enum(["dynamic_code", "process_spawn", "network_access", "sandbox_escape"]),
  severity: SeveritySchema,
  /** `{callee}` is replaced with the resolved callee name */
  description: z.string().min(1),
});

const FilesystemRuleSchema = z.object({
  pattern: z.string().min(1),
  pathArgument: z.number().int().nonnegative().default(0),
  pathKeywords: z.array(z.string()).default([]),
});

export const LanguageCatalogSchema = z.object({
  deniedModules: z.array(z.string().min(1)),
  defaultDeniedFunctions: z.array(z.string().min(1)),
  dangerousCalls: z.array(CallRuleSchema),
  filesystemCalls: z.array(FilesystemRuleSchema),
  stringTimers: z.array(z.string()).default([]),
  sandboxEscapeAttributes: z.array(z.string()).default([]),
});

export type LanguageCatalog = z.infer<typeof LanguageCatalogSchema>;
export type CallRule = z.infer<typeof CallRuleSchema>;
export type FilesystemRule = z.infer<typeof FilesystemRuleSchema>;

export const PYTHON_CATALOG: LanguageCatalog = LanguageCatalogSchema.parse(pythonCatalog);
export const JAVASCRIPT_CATALOG: LanguageCatalog = LanguageCatalogSchema.parse(javascriptCatalog);

/** TypeScript shares the JavaScript catalog */
export function catalogFor(language: Language): LanguageCatalog {
  return language === "python" ? PYTHON_CATALOG : JAVASCRIPT_CATALOG;
}

export function builtinDeniedModules(language: Language): string[] {
  return [...catalogFor(language).deniedModules].sort();
}

export function builtinDeniedFunctions(language: Language): string[] {
  return [...catalogFor(language).defaultDeniedFunctions].sort();
}

export function findCallRule(catalog: LanguageCatalog, callee: string): CallRule | undefined {
  return catalog.dangerousCalls.find((rule) => matchesPattern(callee, rule.pattern));
}

export function findFilesystemRule(catalog: LanguageCatalog, callee: string): FilesystemRule | undefined {
  return catalog.filesystemCalls.find((rule) => matchesPattern(callee, rule.pattern));
}

export function describeCall(rule: CallRule, callee: string): string {
  return rule.description.replace("{callee}", callee);
}
