/**
 * Name matching shared by analyzers and the policy evaluator
 */

const globCache = new Map<string, RegExp>();

/**
 * Glob match where `*` stands for any run of characters, dots included
 */
export function matchesPattern(name: string, pattern: string): boolean {
  if (!pattern.includes("*")) return name === pattern;
  let regex = globCache.get(pattern);
  if (!regex) {
    const source = pattern
      .split("*")
      .map((part) => part.replace(/[.+?^${}()|[\]\\]/g, "\\$&"))
      .join(".*");
    regex = new RegExp(`^${source}$`);
    globCache.set(pattern, regex);
  }
  return regex.test(name);
}

export function matchesAny(name: string, patterns: Iterable<string>): string | undefined {
  for (const pattern of patterns) {
    if (matchesPattern(name, pattern)) return pattern;
  }
  return undefined;
}

/**
 * True when `module` is `entry` or one of its submodules ("os.path" under "os", "fs/promises" under "fs")
 */
export function isModuleUnder(module: string, entry: string): boolean {
  if (module === entry) return true;
  return module.startsWith(`${entry}.`) || module.startsWith(`${entry}/`);
}

export function findModuleEntry(module: string, entries: Iterable<string>): string | undefined {
  for (const entry of entries) {
    if (isModuleUnder(module, entry)) return entry;
  }
  return undefined;
}

/**
 * Top-level package of an import: "os.path" -> "os", "@scope/pkg/sub" -> "@scope/pkg"
 */
export function rootModule(module: string): string {
  if (module.startsWith("@")) {
    return module.split("/").slice(0, 2).join("/");
  }
  return module.split(/[./]/)[0] ?? module;
}
