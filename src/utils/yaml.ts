/**
 * YAML parsing utilities.
 * Wraps the 'yaml' package with error handling.
 */

import { parse } from 'yaml';

/**
 * Parse a YAML document. Returns the parsed value or the parser's message.
 */
export function validateYaml(input: string): { valid: true; data: unknown } | { valid: false; error: string } {
  try {
    return { valid: true, data: parse(input) };
  } catch (e) {
    return { valid: false, error: e instanceof Error ? e.message : String(e) };
  }
}
