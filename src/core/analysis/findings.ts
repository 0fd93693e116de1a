/**
 * Finding collection shared by the language analyzers
 */

import { IssueCategory, SecurityIssue, Severity, StructuralFacts } from "../types";

export const MAX_SNIPPET_LENGTH = 120;

export function snippetOf(lines: readonly string[], lineNumber: number): string {
  const line = (lines[lineNumber - 1] ?? "").trim();
  return line.length > MAX_SNIPPET_LENGTH ? `${line.slice(0, MAX_SNIPPET_LENGTH - 3)}...` : line;
}

/**
 * Code-unit ordering, independent of the host locale
 */
export function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function createIssue(
  severity: Severity,
  category: IssueCategory,
  lineNumber: number,
  snippet: string,
  description: string
): SecurityIssue {
  return Object.freeze({ severity, category, lineNumber, snippet, description });
}

/**
 * De-duplicates findings and returns them in source order
 */
export class FindingCollector {
  private readonly issues = new Map<string, SecurityIssue>();
  private readonly lines: string[];

  constructor(source: string) {
    this.lines = source.split(/\r\n|\r|\n/);
  }

  get lineCount(): number {
    return this.lines.length;
  }

  add(severity: Severity, category: IssueCategory, lineNumber: number, description: string): void {
    const key = `${lineNumber}|${category}|${description}`;
    if (this.issues.has(key)) return;
    this.issues.set(key, createIssue(severity, category, lineNumber, snippetOf(this.lines, lineNumber), description));
  }

  toArray(): SecurityIssue[] {
    return [...this.issues.values()].sort(
      (a, b) =>
        a.lineNumber - b.lineNumber ||
        compareText(a.category, b.category) ||
        compareText(a.description, b.description)
    );
  }
}

export function emptyFacts(lineCount = 0): StructuralFacts {
  return {
    imports: [],
    calls: [],
    functions: [],
    recursiveFunctions: [],
    branchCount: 0,
    loopCount: 0,
    maxNestingDepth: 0,
    unboundedLoopLines: [],
    usesNetwork: false,
    usesFilesystem: false,
    lineCount,
  };
}
