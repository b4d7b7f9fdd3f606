/**
 * Format decoders
 *
 * One decoder is active per Config. Custom formats implement {@link Decoder}
 * and are passed to `Config.setDecoder()`.
 */

import { JsonDecoder } from './json-decoder.js';
import { TomlDecoder } from './toml-decoder.js';
import { YamlDecoder } from './yaml-decoder.js';
import { Format, type Decoder } from './types.js';

const decoders: Record<Format, Decoder> = {
  [Format.JSON]: new JsonDecoder(),
  [Format.TOML]: new TomlDecoder(),
  [Format.YAML]: new YamlDecoder(),
};

export function getDecoder(format: Format): Decoder {
  return decoders[format];
}

export function getSupportedFormats(): Format[] {
  return Object.values(Format);
}

export { Format, JsonDecoder, TomlDecoder, YamlDecoder };
export type { Decoder, ParsePosition, TextMap } from './types.js';
