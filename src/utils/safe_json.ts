/**
 * @fileoverview Safe JSON Parsing
 *
 * @packageDocumentation
 */

import { Err, Ok, safeSync, type Result } from '../core/result.js';

/**
 * Safely parse JSON, returning a Result with ok/value/error
 */
export function safeJsonParse<T = unknown>(text: string): Result<T, Error> {
  const parsed = safeSync((): T => JSON.parse(text));
  return parsed.ok ? Ok(parsed.value) : Err(parsed.error);
}

/**
 * Narrow an unknown JSON value to a plain object
 */
export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Stable pretty form used for every document the store writes
 */
export function stringifyDocument(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}
