/**
 * YAML config file loader
 *
 * ```yaml
 * directory: languages
 * format: toml
 * languages: [en, es]
 * ```
 *
 * A relative `directory` is resolved against the config file's own directory.
 */

import { readFileSync } from 'fs';
import { dirname, isAbsolute, resolve } from 'path';
import { load as parseYaml, YAMLException } from 'js-yaml';
import { Config, DEFAULT_DIRECTORY } from '../config.js';
import { extractErrorMessage, fail, LanguagesErrorCode, type ErrorDetails, type Result } from '../errors.js';
import { ConfigFileSchema } from '../schemas/config-schemas.js';
import { logger } from './logger.js';

export function loadConfigFile(filePath: string): Result<Config> {
  let contents: string;
  try {
    contents = readFileSync(filePath, 'utf8');
  } catch (error) {
    const missing = error instanceof Error && 'code' in error && error.code === 'ENOENT';
    return fail(
      missing ? LanguagesErrorCode.FILE_NOT_FOUND : LanguagesErrorCode.IO_ERROR,
      `Failed to read config file ${filePath}: ${extractErrorMessage(error)}`,
      { file: filePath },
      error
    );
  }

  let raw: unknown;
  try {
    raw = parseYaml(contents, { filename: filePath });
  } catch (error) {
    const details: ErrorDetails =
      error instanceof YAMLException && error.mark
        ? { file: filePath, line: error.mark.line + 1, column: error.mark.column + 1 }
        : { file: filePath };
    return fail(
      LanguagesErrorCode.PARSE_ERROR,
      `Failed to parse config file ${filePath}: ${extractErrorMessage(error).split('\n')[0]}`,
      details,
      error
    );
  }

  const result = ConfigFileSchema.safeParse(raw ?? {});
  if (!result.success) {
    return fail(
      LanguagesErrorCode.INVALID_CONFIG,
      `Validation failed for ${filePath}: ${result.error.issues.map((issue) => issue.message).join('; ')}`,
      { file: filePath },
      result.error
    );
  }

  const { directory, format, languages } = result.data;
  const baseDir = dirname(resolve(filePath));
  const languagesDir = directory && isAbsolute(directory) ? directory : resolve(baseDir, directory ?? DEFAULT_DIRECTORY);

  logger.debug('Loaded config file', { file: filePath, directory: languagesDir, languages });
  return Config.create(languagesDir, languages, format);
}
