/**
 * Character Normalization
 *
 * Rewrites compatibility forms that multilingual vocabularies do not
 * contain. The code point table lives in data/normalization.json and is
 * loaded and validated once.
 *
 * @module text/normalize
 */

import { readFileSync } from 'fs';
import { createTokenizerError, ERROR_CODES } from '../errors/tokenizer-error.js';
import { log } from '../debug/index.js';

// ============================================================================
// Table Types
// ============================================================================

interface CodepointRange {
  start: number;
  end: number;
}

interface NumericSegment extends CodepointRange {
  firstValue: number;
}

/**
 * Parsed normalization table.
 */
export interface NormalizationTable {
  /** Replaced by their NFKC expansion */
  nonNormalizedRanges: CodepointRange[];
  /** Replaced by their decimal value surrounded by spaces */
  numericRanges: CodepointRange[];
  /** Decimal value per numeric code point */
  numericValues: Map<number, number>;
  /** Fixed single-character substitutions */
  substitutions: Map<number, string>;
}

const TABLE_URL = new URL('./data/normalization.json', import.meta.url);

let cachedTable: NormalizationTable | null = null;

// ============================================================================
// Validation
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalidTable(detail: string): Error {
  return createTokenizerError(
    ERROR_CODES.INVALID_NORMALIZATION_TABLE,
    `[Normalize] Invalid normalization table: ${detail}`
  );
}

function parseCodepoint(value: unknown, where: string): number {
  if (typeof value !== 'string' || !/^0x[0-9A-Fa-f]+$/.test(value)) {
    throw invalidTable(`${where} must be a hex string like "0x2460"`);
  }
  return parseInt(value.slice(2), 16);
}

function parseRanges(value: unknown, key: string): CodepointRange[] {
  if (!Array.isArray(value)) {
    throw invalidTable(`"${key}" must be an array`);
  }
  return value.map((entry: unknown, i) => {
    if (!isRecord(entry)) {
      throw invalidTable(`${key}[${i}] must be an object`);
    }
    const start = parseCodepoint(entry.start, `${key}[${i}].start`);
    const end = parseCodepoint(entry.end, `${key}[${i}].end`);
    if (end < start) {
      throw invalidTable(`${key}[${i}] ends before it starts`);
    }
    return { start, end };
  });
}

/**
 * Validate raw JSON into a NormalizationTable. Every numeric code point must
 * have a value.
 */
export function parseNormalizationTable(raw: unknown): NormalizationTable {
  if (!isRecord(raw)) {
    throw invalidTable('root must be an object');
  }

  const nonNormalizedRanges = parseRanges(raw.nonNormalizedRanges, 'nonNormalizedRanges');
  const numericRanges = parseRanges(raw.numericRanges, 'numericRanges');

  if (!Array.isArray(raw.numericValues)) {
    throw invalidTable('"numericValues" must be an array');
  }
  const numericValues = new Map<number, number>();
  raw.numericValues.forEach((entry: unknown, i) => {
    if (!isRecord(entry) || typeof entry.firstValue !== 'number') {
      throw invalidTable(`numericValues[${i}] needs start, end and a numeric firstValue`);
    }
    const [segment] = parseRanges([entry], `numericValues[${i}]`);
    const seg: NumericSegment = { ...segment, firstValue: entry.firstValue };
    for (let cp = seg.start; cp <= seg.end; cp++) {
      numericValues.set(cp, seg.firstValue + (cp - seg.start));
    }
  });

  for (const range of numericRanges) {
    for (let cp = range.start; cp <= range.end; cp++) {
      if (!numericValues.has(cp)) {
        throw invalidTable(`numeric code point 0x${cp.toString(16).toUpperCase()} has no value`);
      }
    }
  }

  if (!Array.isArray(raw.substitutions)) {
    throw invalidTable('"substitutions" must be an array');
  }
  const substitutions = new Map<number, string>();
  raw.substitutions.forEach((entry: unknown, i) => {
    if (!isRecord(entry) || typeof entry.replacement !== 'string') {
      throw invalidTable(`substitutions[${i}] needs a codepoint and a string replacement`);
    }
    substitutions.set(parseCodepoint(entry.codepoint, `substitutions[${i}].codepoint`), entry.replacement);
  });

  return { nonNormalizedRanges, numericRanges, numericValues, substitutions };
}

/**
 * Load (once) and return the bundled normalization table.
 */
export function getNormalizationTable(): NormalizationTable {
  if (cachedTable === null) {
    const raw: unknown = JSON.parse(readFileSync(TABLE_URL, 'utf8'));
    cachedTable = parseNormalizationTable(raw);
    log.debug(
      'Normalize',
      `Loaded table: ${cachedTable.nonNormalizedRanges.length} form ranges, ` +
      `${cachedTable.numericValues.size} numeric code points, ${cachedTable.substitutions.size} substitutions`
    );
  }
  return cachedTable;
}

// ============================================================================
// Predicates
// ============================================================================

function inRanges(cp: number, ranges: CodepointRange[]): boolean {
  return ranges.some((r) => cp >= r.start && cp <= r.end);
}

/**
 * Halfwidth/Fullwidth, Small Form Variant, CJK Compatibility or enclosed
 * letter forms.
 */
export function isNonNormalizedChar(ch: string, table: NormalizationTable = getNormalizationTable()): boolean {
  return inRanges(ch.codePointAt(0) ?? 0, table.nonNormalizedRanges);
}

/**
 * Enclosed or Roman-numeral number forms.
 */
export function isNonNormalizedNumeric(ch: string, table: NormalizationTable = getNormalizationTable()): boolean {
  return inRanges(ch.codePointAt(0) ?? 0, table.numericRanges);
}

// ============================================================================
// Normalization
// ============================================================================

/**
 * Per character: compatibility forms become their NFKC expansion, number
 * forms become ` <value> `, table substitutions apply, anything else passes
 * through unchanged.
 */
export function normalizeChars(text: string, table: NormalizationTable = getNormalizationTable()): string {
  let output = '';
  for (const ch of text) {
    const cp = ch.codePointAt(0) ?? 0;
    if (inRanges(cp, table.nonNormalizedRanges)) {
      output += ch.normalize('NFKC');
    } else if (inRanges(cp, table.numericRanges)) {
      output += ` ${table.numericValues.get(cp) ?? 0} `;
    } else {
      output += table.substitutions.get(cp) ?? ch;
    }
  }
  return output;
}
