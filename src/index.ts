/**
 * languages-loader
 *
 * Loads per-language text files (JSON, TOML or YAML) from a directory and
 * exposes typed lookups.
 *
 * `languages/en.json`
 * ```json
 * { "hello_world": "Hello world!" }
 * ```
 *
 * ```typescript
 * import { Config, load, unwrap } from 'languages-loader';
 *
 * const config = Config.default();
 * unwrap(config.addLanguage('en'));
 *
 * const languages = unwrap(load(config));
 * const hello = unwrap(languages.tryGetTextFromLanguage('en', 'hello_world'));
 * console.log(unwrap(hello.getString())); // Hello world!
 * ```
 */

export { Config, DEFAULT_DIRECTORY } from './config.js';
export {
  Format,
  JsonDecoder,
  TomlDecoder,
  YamlDecoder,
  getDecoder,
  getSupportedFormats,
  type Decoder,
  type ParsePosition,
  type TextMap,
} from './decoders/index.js';
export {
  LanguagesError,
  LanguagesErrorCode,
  extractErrorMessage,
  fail,
  ok,
  unwrap,
  type ErrorDetails,
  type Failure,
  type Result,
} from './errors.js';
export { LanguageTexts } from './language-texts.js';
export { Languages } from './languages.js';
export { load, resolveLanguageFile } from './loader.js';
export { ConfigFileSchema, type ConfigFile } from './schemas/config-schemas.js';
export { loadConfigFile } from './utils/config-loader.js';
export { LogLevel, getLogger, logger, type LogContext } from './utils/logger.js';
export { flattenKeys, validateLanguages, type LanguageReport, type ValidationReport } from './validate.js';
export { Value, type PlainValue, type ValueData, type ValueKind } from './value.js';
