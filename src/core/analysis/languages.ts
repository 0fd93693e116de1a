/**
 * Language tags and aliases
 */

import path from "path";
import { UnsupportedLanguageError } from "../errors";
import { Language } from "../types";

export const LANGUAGES: readonly Language[] = ["python", "javascript", "typescript"];

const ALIASES = new Map<string, Language>([
  ["python", "python"],
  ["python3", "python"],
  ["py", "python"],
  ["javascript", "javascript"],
  ["js", "javascript"],
  ["mjs", "javascript"],
  ["cjs", "javascript"],
  ["typescript", "typescript"],
  ["ts", "typescript"],
  ["mts", "typescript"],
  ["cts", "typescript"],
]);

/**
 * Resolve a declared language tag to its canonical form.
 * Throws UnsupportedLanguageError for unknown tags.
 */
export function resolveLanguage(tag: string): Language {
  const language = ALIASES.get(tag.trim().toLowerCase());
  if (!language) {
    throw new UnsupportedLanguageError(tag, [...ALIASES.keys()]);
  }
  return language;
}

/**
 * Infer the language from a file name, if the extension is known
 */
export function languageFromPath(filePath: string): Language | undefined {
  const ext = path.extname(filePath).slice(1).toLowerCase();
  return ext ? ALIASES.get(ext) : undefined;
}
