/**
 * Test helpers: fixture paths and Result unwrapping
 */

import { join } from 'path';
import { fileURLToPath } from 'url';
import type { LanguagesError, Result } from '../../src/errors.js';

const FIXTURES_DIR = fileURLToPath(new URL('../fixtures', import.meta.url));

export function fixturePath(...parts: string[]): string {
  return join(FIXTURES_DIR, ...parts);
}

/**
 * Return the data of a successful result, failing the test otherwise
 */
export function expectOk<T>(result: Result<T>): T {
  if (!result.success) {
    throw new Error(`Expected success but got ${result.error.code}: ${result.error.message}`);
  }
  return result.data;
}

/**
 * Return the error of a failed result, failing the test otherwise
 */
export function expectErr<T>(result: Result<T>): LanguagesError {
  if (result.success) {
    throw new Error('Expected a failure but the operation succeeded');
  }
  return result.error;
}
