/**
 * SCPI Response Parser
 *
 * Utilities for parsing SCPI (Standard Commands for Programmable Instruments)
 * responses. Works over any transport (serial, GPIB, socket, USB-TMC).
 * Failures are reported as plain strings; callers wrap them in a DecodeError
 * that carries the command and response.
 */

import { Result, Ok, Err } from '../../shared/types.js';

/**
 * SCPI instruments report 9.91E37 for "not a number" and overflow.
 * Any value above this threshold is considered invalid.
 */
const SCPI_OVERFLOW_THRESHOLD = 9e36;

/** Some instruments return "****" when a measurement is unavailable. */
const INVALID_MARKER = '****';

const NUMERIC = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

export const ScpiParser = {
  /**
   * Parse a numeric SCPI response.
   *
   * Handles:
   * - Standard numeric responses ("1.234", "-5.67E-3", "+5.000E+00")
   * - Invalid markers ("****")
   * - Overflow values (9.9E37)
   * - Empty and non-numeric responses
   */
  parseNumber(response: string): Result<number, string> {
    const trimmed = response.trim();

    if (trimmed === '') {
      return Err('empty response');
    }

    if (trimmed.includes(INVALID_MARKER)) {
      return Err('invalid measurement (****)');
    }

    if (!NUMERIC.test(trimmed)) {
      return Err(`non-numeric response: "${trimmed}"`);
    }

    const value = parseFloat(trimmed);

    if (Math.abs(value) > SCPI_OVERFLOW_THRESHOLD) {
      return Err('overflow (9.9E37)');
    }

    return Ok(value);
  },

  /**
   * Parse an integer response. "+5" and "5.0" are accepted, "5.5" is not.
   */
  parseInteger(response: string): Result<number, string> {
    const parsed = this.parseNumber(response);
    if (!parsed.ok) return parsed;
    if (!Number.isInteger(parsed.value)) {
      return Err(`non-integer response: "${response.trim()}"`);
    }
    return parsed;
  },

  /**
   * Parse a SCPI response using an enum mapping.
   *
   * @param map - Mapping from SCPI tokens to typed values
   * @returns Result with mapped value, or error if not found in map
   */
  parseEnum<T>(response: string, map: Record<string, T>): Result<T, string> {
    const trimmed = response.trim();

    // Try exact match first
    if (Object.prototype.hasOwnProperty.call(map, trimmed)) {
      return Ok(map[trimmed]);
    }

    // Try case-insensitive match
    const upper = trimmed.toUpperCase();
    for (const [key, value] of Object.entries(map)) {
      if (key.toUpperCase() === upper) {
        return Ok(value);
      }
    }

    const validKeys = Object.keys(map).join(', ');
    return Err(`unknown value "${trimmed}", expected one of: ${validKeys}`);
  },

  /**
   * Parse the length header of an IEEE 488.2 definite length block.
   *
   * Format: #NXXXXXXXX...data...
   * - # is the header marker
   * - N is a single digit indicating how many digits follow for the length
   * - XXXXXXXX is the data length in bytes (N digits)
   *
   * @param prefix - The two bytes "#N"
   * @returns Number of length digits that follow
   */
  parseBlockPrefix(prefix: Buffer): Result<number, string> {
    if (prefix.length < 2) {
      return Err('buffer too short for definite length block');
    }

    if (prefix[0] !== 0x23) {  // '#'
      return Err('missing # header marker');
    }

    const numDigitsChar = String.fromCharCode(prefix[1]);
    const numDigits = parseInt(numDigitsChar, 10);

    if (isNaN(numDigits) || numDigits < 1 || numDigits > 9) {
      return Err(`invalid digit count: "${numDigitsChar}"`);
    }

    return Ok(numDigits);
  },

  /** Parse the N length digits that follow "#N". */
  parseBlockLength(digits: Buffer): Result<number, string> {
    const lengthStr = digits.toString('ascii');
    if (!/^\d+$/.test(lengthStr)) {
      return Err(`invalid length field: "${lengthStr}"`);
    }
    return Ok(parseInt(lengthStr, 10));
  },

  /**
   * Check if a SCPI error response indicates success.
   *
   * Standard SCPI error format: "0,No error" or "+0,No error"
   */
  isErrorResponseOk(response: string): boolean {
    const trimmed = response.trim();
    return trimmed.startsWith('0,') || trimmed.startsWith('+0,');
  },

  /**
   * Parse a comma-separated SCPI response into parts.
   */
  parseCsv(response: string): string[] {
    return response.split(',').map(s => s.trim());
  },
};
