/**
 * Bundle completeness checks
 *
 * Compares every loaded language against a base language and reports keys
 * that are missing, keys that only exist in the translation, and empty
 * strings. Useful in an application's own test suite.
 */

import { ok, type Result } from './errors.js';
import type { LanguageTexts } from './language-texts.js';
import type { Languages } from './languages.js';
import type { Value } from './value.js';

export interface LanguageReport {
  language: string;
  missingKeys: string[];
  extraKeys: string[];
  emptyValues: string[];
}

export interface ValidationReport {
  baseLanguage: string;
  languages: LanguageReport[];
  /** True when no language has missing or extra keys */
  complete: boolean;
}

/**
 * Flatten nested mappings into dot-notation leaf keys. Sequences are leaves.
 */
export function flattenKeys(texts: LanguageTexts): string[] {
  return Array.from(flattenEntries(texts).keys());
}

export function validateLanguages(languages: Languages, baseLanguage: string): Result<ValidationReport> {
  const base = languages.tryGetLanguage(baseLanguage);
  if (!base.success) {
    return base;
  }

  const baseKeys = new Set(flattenKeys(base.data));
  const reports: LanguageReport[] = [];

  for (const code of languages.getLanguageCodes()) {
    const texts = languages.tryGetLanguage(code);
    if (!texts.success) {
      return texts;
    }

    const leaves = flattenEntries(texts.data);
    const report: LanguageReport = {
      language: code,
      missingKeys: [...baseKeys].filter((key) => !leaves.has(key)),
      extraKeys: [...leaves.keys()].filter((key) => !baseKeys.has(key)),
      emptyValues: [...leaves].filter(([, value]) => isEmptyString(value)).map(([key]) => key),
    };
    reports.push(report);
  }

  return ok({
    baseLanguage,
    languages: reports,
    complete: reports.every((report) => report.missingKeys.length === 0 && report.extraKeys.length === 0),
  });
}

function flattenEntries(texts: LanguageTexts): Map<string, Value> {
  const leaves = new Map<string, Value>();

  const visit = (value: Value, key: string): void => {
    const mapping = value.getMapping();
    if (!mapping.success) {
      leaves.set(key, value);
      return;
    }
    for (const [child, item] of mapping.data) {
      visit(item, `${key}.${child}`);
    }
  };

  for (const [key, value] of texts.entries()) {
    visit(value, key);
  }
  return leaves;
}

function isEmptyString(value: Value): boolean {
  const text = value.getString();
  return text.success && text.data.trim().length === 0;
}
