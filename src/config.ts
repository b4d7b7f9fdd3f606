/**
 * Loader configuration: where the language files live, which languages to
 * load, and which format they are written in.
 *
 * Building a Config never touches the filesystem; a missing directory or file
 * surfaces when `load()` runs.
 *
 * @example
 * ```typescript
 * const config = Config.default();
 * config.addLanguage('en');
 * config.setFormat(Format.TOML);
 * ```
 */

import { getDecoder } from './decoders/index.js';
import { Format, type Decoder } from './decoders/types.js';
import { fail, LanguagesErrorCode, ok, type Result } from './errors.js';

export const DEFAULT_DIRECTORY = 'languages';

/**
 * Letters and digits, optionally joined by single `-` or `_` (en, pt-BR, zh_Hant).
 * Codes become file names, so dots and path separators are rejected.
 */
const LANGUAGE_CODE_PATTERN = /^[A-Za-z0-9]+(?:[-_][A-Za-z0-9]+)*$/;

export class Config {
  private directory: string;
  private readonly languages: string[] = [];
  private decoder: Decoder = getDecoder(Format.JSON);

  private constructor(directory: string) {
    this.directory = directory;
  }

  /**
   * `languages/` directory, no languages, JSON files
   */
  static default(): Config {
    return new Config(DEFAULT_DIRECTORY);
  }

  /**
   * Build a config in one step. Fails on the first invalid or repeated code.
   */
  static create(directory: string, languages: readonly string[], format: Format = Format.JSON): Result<Config> {
    const config = Config.default();

    const dir = config.setDirectory(directory);
    if (!dir.success) {
      return dir;
    }

    config.setFormat(format);

    for (const language of languages) {
      const added = config.addLanguage(language);
      if (!added.success) {
        return added;
      }
    }

    return ok(config);
  }

  static isValidLanguageCode(code: string): boolean {
    return LANGUAGE_CODE_PATTERN.test(code);
  }

  getDirectory(): string {
    return this.directory;
  }

  setDirectory(directory: string): Result<Config> {
    if (directory.trim().length === 0) {
      return fail(LanguagesErrorCode.INVALID_DIRECTORY, 'The languages directory cannot be empty.');
    }
    this.directory = directory;
    return ok(this);
  }

  /**
   * Configured language codes, in insertion order
   */
  getLanguages(): readonly string[] {
    return [...this.languages];
  }

  hasLanguage(code: string): boolean {
    return this.languages.includes(code);
  }

  /**
   * Append a language code. Re-adding a code is an error, not a no-op.
   */
  addLanguage(code: string): Result<Config> {
    if (code.length === 0) {
      return fail(LanguagesErrorCode.INVALID_LANGUAGE_CODE, 'The language code cannot be empty.', { code });
    }
    if (!Config.isValidLanguageCode(code)) {
      return fail(
        LanguagesErrorCode.INVALID_LANGUAGE_CODE,
        `Invalid language code \`${code}\`. Use letters and digits, optionally separated by "-" or "_".`,
        { code }
      );
    }
    if (this.languages.includes(code)) {
      return fail(LanguagesErrorCode.DUPLICATE_LANGUAGE, `The language \`${code}\` already exists.`, { code });
    }

    this.languages.push(code);
    return ok(this);
  }

  /**
   * Format of the active decoder (`json`, `toml`, `yaml`, or a custom name)
   */
  getFormat(): string {
    return this.decoder.format;
  }

  /**
   * Select a built-in format. Replaces any custom decoder.
   */
  setFormat(format: Format): Config {
    this.decoder = getDecoder(format);
    return this;
  }

  getDecoder(): Decoder {
    return this.decoder;
  }

  /**
   * Use a custom decoder (a format this package does not ship)
   */
  setDecoder(decoder: Decoder): Config {
    this.decoder = decoder;
    return this;
  }
}
