/**
 * Value - the typed container for a decoded text entry.
 *
 * Every format decodes into the same closed union, so lookups never depend on
 * which file format a bundle came from:
 *
 * ```json
 * {
 *   "hello_world": "Hello, world!",
 *   "pages": { "home": { "title": "Home page" } },
 *   "messages": ["Message 1", "Message 2"],
 *   "max_items": 20,
 *   "beta": true
 * }
 * ```
 *
 * @packageDocumentation
 */

import { fail, LanguagesErrorCode, ok, type Failure, type Result } from './errors.js';

export type ValueKind = 'string' | 'integer' | 'float' | 'boolean' | 'mapping' | 'sequence';

export type ValueData =
  | { kind: 'string'; value: string }
  | { kind: 'integer'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'boolean'; value: boolean }
  | { kind: 'mapping'; value: ReadonlyMap<string, Value> }
  | { kind: 'sequence'; value: readonly Value[] };

export type PlainValue = string | number | boolean | PlainValue[] | { [key: string]: PlainValue };

export class Value {
  private readonly data: ValueData;

  private constructor(data: ValueData) {
    this.data = data;
    Object.freeze(this);
  }

  static string(value: string): Value {
    return new Value({ kind: 'string', value });
  }

  /**
   * Numbers go through {@link Value.from}, which checks the integer and float ranges.
   */
  private static integer(value: number): Value {
    return new Value({ kind: 'integer', value });
  }

  private static float(value: number): Value {
    return new Value({ kind: 'float', value });
  }

  static boolean(value: boolean): Value {
    return new Value({ kind: 'boolean', value });
  }

  static mapping(entries: Iterable<[string, Value]>): Value {
    return new Value({ kind: 'mapping', value: new Map(entries) });
  }

  static sequence(items: Iterable<Value>): Value {
    return new Value({ kind: 'sequence', value: Object.freeze(Array.from(items)) });
  }

  /**
   * Build a Value from parser output.
   * Numbers without a fractional part become integers; integers outside the
   * safe range are rejected rather than rounded.
   */
  static from(raw: unknown, path = ''): Result<Value> {
    switch (typeof raw) {
      case 'string':
        return ok(Value.string(raw));
      case 'boolean':
        return ok(Value.boolean(raw));
      case 'number':
        if (!Number.isFinite(raw) || (Number.isInteger(raw) && !Number.isSafeInteger(raw))) {
          return unsupported(raw, path);
        }
        return ok(Number.isInteger(raw) ? Value.integer(raw) : Value.float(raw));
      case 'bigint':
        if (raw > BigInt(Number.MAX_SAFE_INTEGER) || raw < BigInt(Number.MIN_SAFE_INTEGER)) {
          return unsupported(raw, path);
        }
        return ok(Value.integer(Number(raw)));
    }

    if (typeof raw !== 'object' || raw === null) {
      return unsupported(raw, path);
    }

    if (Array.isArray(raw)) {
      const items: Value[] = [];
      for (const [index, item] of raw.entries()) {
        const result = Value.from(item, `${path}[${index}]`);
        if (!result.success) {
          return result;
        }
        items.push(result.data);
      }
      return ok(Value.sequence(items));
    }

    if (!isPlainObject(raw)) {
      return unsupported(raw, path);
    }

    const entries = new Map<string, Value>();
    for (const [key, item] of Object.entries(raw)) {
      const result = Value.from(item, path ? `${path}.${key}` : key);
      if (!result.success) {
        return result;
      }
      entries.set(key, result.data);
    }
    return ok(Value.mapping(entries));
  }

  get kind(): ValueKind {
    return this.data.kind;
  }

  isString(): boolean {
    return this.data.kind === 'string';
  }

  isInteger(): boolean {
    return this.data.kind === 'integer';
  }

  isFloat(): boolean {
    return this.data.kind === 'float';
  }

  /**
   * True for integers and floats
   */
  isNumber(): boolean {
    return this.data.kind === 'integer' || this.data.kind === 'float';
  }

  isBoolean(): boolean {
    return this.data.kind === 'boolean';
  }

  isMapping(): boolean {
    return this.data.kind === 'mapping';
  }

  isSequence(): boolean {
    return this.data.kind === 'sequence';
  }

  getString(): Result<string> {
    return this.data.kind === 'string' ? ok(this.data.value) : this.mismatch('string');
  }

  getInteger(): Result<number> {
    return this.data.kind === 'integer' ? ok(this.data.value) : this.mismatch('integer');
  }

  /**
   * Integers widen to floats; nothing else converts.
   */
  getFloat(): Result<number> {
    switch (this.data.kind) {
      case 'float':
      case 'integer':
        return ok(this.data.value);
      default:
        return this.mismatch('float');
    }
  }

  getBoolean(): Result<boolean> {
    return this.data.kind === 'boolean' ? ok(this.data.value) : this.mismatch('boolean');
  }

  getMapping(): Result<ReadonlyMap<string, Value>> {
    return this.data.kind === 'mapping' ? ok(this.data.value) : this.mismatch('mapping');
  }

  getSequence(): Result<readonly Value[]> {
    return this.data.kind === 'sequence' ? ok(this.data.value) : this.mismatch('sequence');
  }

  /**
   * Structural equality. Mapping key order is ignored.
   */
  equals(other: Value): boolean {
    const a = this.data;
    const b = other.data;

    switch (a.kind) {
      case 'string':
      case 'integer':
      case 'float':
      case 'boolean':
        return a.kind === b.kind && a.value === b.value;
      case 'sequence':
        return (
          b.kind === 'sequence' &&
          a.value.length === b.value.length &&
          a.value.every((item, index) => item.equals(b.value[index]))
        );
      case 'mapping': {
        if (b.kind !== 'mapping' || a.value.size !== b.value.size) {
          return false;
        }
        for (const [key, item] of a.value) {
          const counterpart = b.value.get(key);
          if (!counterpart || !item.equals(counterpart)) {
            return false;
          }
        }
        return true;
      }
    }
  }

  toPlain(): PlainValue {
    const data = this.data;
    switch (data.kind) {
      case 'string':
      case 'integer':
      case 'float':
      case 'boolean':
        return data.value;
      case 'sequence':
        return data.value.map((item) => item.toPlain());
      case 'mapping': {
        const result: { [key: string]: PlainValue } = {};
        for (const [key, item] of data.value) {
          // defineProperty keeps `__proto__` an own key instead of calling the setter
          Object.defineProperty(result, key, {
            value: item.toPlain(),
            enumerable: true,
            writable: true,
            configurable: true,
          });
        }
        return result;
      }
    }
  }

  toString(): string {
    const data = this.data;
    switch (data.kind) {
      case 'string':
        return data.value;
      case 'integer':
      case 'float':
      case 'boolean':
        return String(data.value);
      case 'sequence':
        return `[${data.value.map((item) => item.toString()).join(', ')}]`;
      case 'mapping':
        return `{${Array.from(data.value, ([key, item]) => `${key}: ${item.toString()}`).join(', ')}}`;
    }
  }

  private mismatch(expected: ValueKind): Failure {
    return fail(
      LanguagesErrorCode.TYPE_MISMATCH,
      `Expected a ${expected} value but found a ${this.data.kind}.`,
      { expected, actual: this.data.kind }
    );
  }
}

function isPlainObject(raw: object): raw is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(raw);
  return proto === Object.prototype || proto === null;
}

function unsupported(raw: unknown, path: string): Failure {
  const shown = raw === null ? 'null' : raw instanceof Date ? 'date' : typeof raw;
  const where = path ? ` at \`${path}\`` : '';
  return fail(
    LanguagesErrorCode.PARSE_ERROR,
    `Cannot use a ${shown} value${where} as a language text value.`,
    path ? { path } : {}
  );
}
