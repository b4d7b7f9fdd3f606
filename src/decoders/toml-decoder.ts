import { parse, TomlError } from 'smol-toml';
import type { Result } from '../errors.js';
import { syntaxError, toTextMap } from './document.js';
import { Format, type Decoder, type TextMap } from './types.js';

export class TomlDecoder implements Decoder {
  readonly format = Format.TOML;
  readonly extension = 'toml';

  decode(content: string, source?: string): Result<TextMap> {
    let document: unknown;
    try {
      document = parse(content);
    } catch (error) {
      const position = error instanceof TomlError ? { line: error.line, column: error.column } : undefined;
      return syntaxError(this.format, error, position, source);
    }
    return toTextMap(document, this.format, source);
  }
}
