import { CORE_SCHEMA, load, YAMLException } from 'js-yaml';
import type { Result } from '../errors.js';
import { syntaxError, toTextMap } from './document.js';
import { Format, type Decoder, type TextMap } from './types.js';

/**
 * YAML bundles use the core schema, so unquoted dates stay strings.
 */
export class YamlDecoder implements Decoder {
  readonly format = Format.YAML;
  readonly extension = 'yaml';

  decode(content: string, source?: string): Result<TextMap> {
    let document: unknown;
    try {
      document = load(content, { schema: CORE_SCHEMA, filename: source });
    } catch (error) {
      // js-yaml marks are 0-based
      const position =
        error instanceof YAMLException && error.mark
          ? { line: error.mark.line + 1, column: error.mark.column + 1 }
          : undefined;
      return syntaxError(this.format, error, position, source);
    }
    return toTextMap(document ?? {}, this.format, source);
  }
}
