import type { TextMap } from './decoders/types.js';
import { fail, LanguagesErrorCode, ok, type Result } from './errors.js';
import type { Value } from './value.js';

/**
 * The texts of one language, as decoded from its file
 */
export class LanguageTexts {
  private readonly texts: TextMap;

  /**
   * The texts are copied, so later changes to the given map do not reach the bundle.
   */
  constructor(
    public readonly language: string,
    texts: TextMap
  ) {
    this.texts = new Map(texts);
    Object.freeze(this);
  }

  get size(): number {
    return this.texts.size;
  }

  /**
   * Top-level text keys, in file order
   */
  keys(): string[] {
    return Array.from(this.texts.keys());
  }

  hasText(key: string): boolean {
    return this.texts.has(key);
  }

  tryGetText(key: string): Result<Value> {
    const value = this.texts.get(key);
    if (value === undefined) {
      return fail(
        LanguagesErrorCode.TEXT_NOT_FOUND,
        `Cannot find the \`${key}\` text in the \`${this.language}\` language.`,
        { language: this.language, key }
      );
    }
    return ok(value);
  }

  /**
   * Look up a nested text with a dot-notation path, e.g. `pages.home.title`
   */
  tryGetPath(path: string): Result<Value> {
    const [head, ...rest] = path.split('.');
    let current = this.tryGetText(head);
    let walked = head;

    for (const part of rest) {
      if (!current.success) {
        break;
      }

      const mapping = current.data.getMapping();
      if (!mapping.success) {
        return fail(
          LanguagesErrorCode.TYPE_MISMATCH,
          `Cannot read \`${part}\` of \`${walked}\` in the \`${this.language}\` language: not a mapping.`,
          { ...mapping.error.details, language: this.language, path: walked }
        );
      }

      const next = mapping.data.get(part);
      walked = `${walked}.${part}`;
      current = next
        ? ok(next)
        : fail(
            LanguagesErrorCode.TEXT_NOT_FOUND,
            `Cannot find the \`${walked}\` text in the \`${this.language}\` language.`,
            { language: this.language, key: walked }
          );
    }

    return current;
  }

  entries(): Iterable<[string, Value]> {
    return this.texts.entries();
  }
}
