import { fail, LanguagesErrorCode, ok, type ErrorDetails, type Failure, type Result } from '../errors.js';
import { Value } from '../value.js';
import type { ParsePosition, TextMap } from './types.js';

/**
 * Turn a parsed document into a text map. The document root must be a mapping.
 */
export function toTextMap(document: unknown, format: string, source?: string): Result<TextMap> {
  const result = Value.from(document);
  if (!result.success) {
    return fail(
      LanguagesErrorCode.PARSE_ERROR,
      `Invalid ${format} document${source ? ` \`${source}\`` : ''}: ${result.error.message}`,
      { ...result.error.details, format, ...(source ? { source } : {}) },
      result.error
    );
  }

  const texts = result.data.getMapping();
  if (!texts.success) {
    return fail(
      LanguagesErrorCode.PARSE_ERROR,
      `The root of a ${format} language file must be a mapping, found a ${result.data.kind}.`,
      { format, ...(source ? { source } : {}) }
    );
  }

  return ok(texts.data);
}

/**
 * Build the PARSE_ERROR result for a syntax error reported by a parser
 */
export function syntaxError(
  format: string,
  error: unknown,
  position: ParsePosition | undefined,
  source?: string
): Failure {
  const reason = error instanceof Error ? error.message.split('\n')[0] : String(error);
  const details: ErrorDetails = { format };
  if (source) {
    details.source = source;
  }
  if (position) {
    details.line = position.line;
    details.column = position.column;
  }

  const where = [source, position ? `${position.line}:${position.column}` : undefined]
    .filter((part): part is string => part !== undefined)
    .join(':');

  return fail(
    LanguagesErrorCode.PARSE_ERROR,
    `Failed to parse ${format}${where ? ` (${where})` : ''}: ${reason}`,
    details,
    error
  );
}
