/**
 * Language file loader
 *
 * Reads `<directory>/<code>.<extension>` for every configured language and
 * decodes it with the config's decoder. The first failure aborts the load, so
 * a Languages instance always holds every configured language.
 *
 * @packageDocumentation
 */

import { readFileSync } from 'fs';
import { join, resolve } from 'path';
import type { Config } from './config.js';
import { extractErrorMessage, fail, LanguagesErrorCode, ok, type Result } from './errors.js';
import { LanguageTexts } from './language-texts.js';
import { Languages } from './languages.js';
import { logger } from './utils/logger.js';

/**
 * Absolute path of a language file for the given config
 */
export function resolveLanguageFile(config: Config, code: string): string {
  return join(resolve(config.getDirectory()), `${code}.${config.getDecoder().extension}`);
}

export function load(config: Config): Result<Languages> {
  const decoder = config.getDecoder();
  const bundles: LanguageTexts[] = [];

  for (const code of config.getLanguages()) {
    const filePath = resolveLanguageFile(config, code);

    const content = readLanguageFile(filePath, code);
    if (!content.success) {
      return content;
    }

    const texts = decoder.decode(content.data, filePath);
    if (!texts.success) {
      return texts;
    }

    logger.debug('Loaded language file', { language: code, file: filePath, texts: texts.data.size });
    bundles.push(new LanguageTexts(code, texts.data));
  }

  return ok(new Languages(bundles));
}

function readLanguageFile(filePath: string, code: string): Result<string> {
  try {
    return ok(readFileSync(filePath, 'utf8'));
  } catch (error) {
    const errno = errorCode(error);
    if (errno === 'ENOENT') {
      return fail(
        LanguagesErrorCode.FILE_NOT_FOUND,
        `Cannot find \`${filePath}\` file.`,
        { language: code, file: filePath },
        error
      );
    }
    return fail(
      LanguagesErrorCode.IO_ERROR,
      `Cannot read \`${filePath}\`: ${extractErrorMessage(error)}`,
      { language: code, file: filePath, ...(errno ? { errno } : {}) },
      error
    );
  }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
