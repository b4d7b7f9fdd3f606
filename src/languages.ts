import { fail, LanguagesErrorCode, ok, type Result } from './errors.js';
import type { LanguageTexts } from './language-texts.js';
import type { Value } from './value.js';

/**
 * Loaded languages, keyed by language code. Built once by `load()`.
 *
 * No fallback between languages is attempted; a caller that wants one checks
 * for LANGUAGE_NOT_FOUND / TEXT_NOT_FOUND and retries with another code.
 */
export class Languages {
  private readonly byCode: ReadonlyMap<string, LanguageTexts>;

  constructor(bundles: Iterable<LanguageTexts>) {
    this.byCode = new Map(Array.from(bundles, (texts): [string, LanguageTexts] => [texts.language, texts]));
    Object.freeze(this);
  }

  /**
   * Loaded language codes, in load order
   */
  getLanguageCodes(): string[] {
    return Array.from(this.byCode.keys());
  }

  hasLanguage(code: string): boolean {
    return this.byCode.has(code);
  }

  tryGetLanguage(code: string): Result<LanguageTexts> {
    const texts = this.byCode.get(code);
    if (!texts) {
      return fail(LanguagesErrorCode.LANGUAGE_NOT_FOUND, `Cannot find the \`${code}\` language.`, {
        language: code,
      });
    }
    return ok(texts);
  }

  tryGetTextFromLanguage(code: string, key: string): Result<Value> {
    const texts = this.tryGetLanguage(code);
    if (!texts.success) {
      return texts;
    }
    return texts.data.tryGetText(key);
  }
}
