/**
 * Decoder contract shared by every source format
 */

import type { Result } from '../errors.js';
import type { Value } from '../value.js';

export enum Format {
  JSON = 'json',
  TOML = 'toml',
  YAML = 'yaml',
}

/**
 * Text key -> Value for one language bundle
 */
export type TextMap = ReadonlyMap<string, Value>;

export interface Decoder {
  readonly format: string;
  /** File extension without the leading dot */
  readonly extension: string;
  /**
   * Decode raw file content into a text map.
   *
   * @param content - File content
   * @param source - File path, reported in parse errors
   */
  decode(content: string, source?: string): Result<TextMap>;
}

/**
 * Line and column (both 1-based) reported by a parser
 */
export interface ParsePosition {
  line: number;
  column: number;
}
