import type { Result } from '../errors.js';
import { syntaxError, toTextMap } from './document.js';
import { Format, type Decoder, type ParsePosition, type TextMap } from './types.js';

export class JsonDecoder implements Decoder {
  readonly format = Format.JSON;
  readonly extension = 'json';

  decode(content: string, source?: string): Result<TextMap> {
    let document: unknown;
    try {
      document = JSON.parse(content);
    } catch (error) {
      return syntaxError(this.format, error, jsonErrorPosition(error, content), source);
    }
    return toTextMap(document, this.format, source);
  }
}

/**
 * V8 reports a character offset ("at position 12") for most JSON syntax
 * errors; convert it to a line and column.
 */
export function jsonErrorPosition(error: unknown, content: string): ParsePosition | undefined {
  if (!(error instanceof Error)) {
    return undefined;
  }

  const match = /at position (\d+)/.exec(error.message);
  if (!match) {
    return undefined;
  }

  const offset = Math.min(Number(match[1]), content.length);
  const before = content.slice(0, offset);
  const line = before.split('\n').length;
  const column = offset - before.lastIndexOf('\n');
  return { line, column };
}
