/**
 * Analyzer registry keyed on canonical language tags
 */

import { UnsupportedLanguageError } from "../errors";
import { Language } from "../types";
import { LanguageAnalyzer } from "./analyzer";
import { JavaScriptAnalyzer } from "./javascript/analyzer";
import { LANGUAGES } from "./languages";
import { PythonAnalyzer } from "./python/analyzer";

export class AnalyzerRegistry {
  private readonly analyzers = new Map<Language, LanguageAnalyzer>();

  /**
   * Register an analyzer for every language it declares. A later registration replaces an earlier one.
   */
  register(analyzer: LanguageAnalyzer): this {
    for (const language of analyzer.languages) {
      this.analyzers.set(language, analyzer);
    }
    return this;
  }

  has(language: Language): boolean {
    return this.analyzers.has(language);
  }

  get(language: Language): LanguageAnalyzer {
    const analyzer = this.analyzers.get(language);
    if (!analyzer) {
      throw new UnsupportedLanguageError(language, this.languages());
    }
    return analyzer;
  }

  languages(): Language[] {
    return LANGUAGES.filter((language) => this.analyzers.has(language));
  }
}

export function createDefaultRegistry(): AnalyzerRegistry {
  return new AnalyzerRegistry().register(new PythonAnalyzer()).register(new JavaScriptAnalyzer());
}
