// Announcement Verifier
// Strict matching - no case folding, no Unicode normalization
// Output is untrusted

import { AnnouncementReport } from '../types/types';
import { ANNOUNCEMENT_PREFIX, REFERENCE_LABELS } from './referenceSet';
import { multisetDifference, multisetEquals, toMultiset } from './multiset';
import { logVerbose as logVerboseShared, logPerformance as logPerformanceShared } from '../../infrastructure/adapters/logging/logger';

function logVerbose(component: string, message: string, data?: Record<string, unknown>): void {
  logVerboseShared(`AnnouncementVerifier:${component}`, message, data);
}

function logPerformance(operation: string, duration: number, metadata?: Record<string, unknown>): void {
  logPerformanceShared(`[AnnouncementVerifier] ${operation}`, duration, metadata);
}

// Every line boundary the text may use, including the Unicode separators
const LINE_BREAK = /\r\n|[\n\r\v\f\x1c\x1d\x1e\x85\u2028\u2029]/;

// Surrounding whitespace: includes the \x1c-\x1f separators, excludes the U+FEFF byte-order mark
const SURROUNDING_WHITESPACE =
  /^[\t\n\v\f\r\x1c-\x1f \x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+|[\t\n\v\f\r\x1c-\x1f \x85\xa0\u1680\u2000-\u200a\u2028\u2029\u202f\u205f\u3000]+$/g;

/**
 * Splits text into trimmed lines, dropping those that are empty after trimming
 */
export function announcementLines(output: string): string[] {
  return output
    .split(LINE_BREAK)
    .map(line => line.replace(SURROUNDING_WHITESPACE, ''))
    .filter(line => line !== '');
}

/**
 * Runs the ordered checks (count, prefix, multiset) and reports the first one that fails
 */
export function inspectAnnouncements(
  output: string,
  reference: readonly string[] = REFERENCE_LABELS,
  prefix: string = ANNOUNCEMENT_PREFIX
): AnnouncementReport {
  const startTime = Date.now();
  const lines = announcementLines(output);
  const base = {
    lineCount: lines.length,
    expectedCount: reference.length,
    missing: [],
    unexpected: [],
  };

  logVerbose('Inspect', 'Parsed announcement lines', {
    line_count: lines.length,
    expected_count: reference.length,
  });

  if (lines.length !== reference.length) {
    logVerbose('Inspect', 'Line count mismatch', base);
    return { ...base, valid: false, fault: 'LINE_COUNT_MISMATCH' };
  }

  const labels: string[] = [];
  for (const line of lines) {
    if (!line.startsWith(prefix)) {
      logVerbose('Inspect', 'Line without announcement prefix', { line });
      return { ...base, valid: false, fault: 'MALFORMED_LINE', malformedLine: line };
    }
    labels.push(line.slice(prefix.length));
  }

  const announced = toMultiset(labels);
  const expected = toMultiset(reference);
  if (!multisetEquals(announced, expected)) {
    const report: AnnouncementReport = {
      ...base,
      valid: false,
      fault: 'LABEL_MISMATCH',
      missing: multisetDifference(expected, announced),
      unexpected: multisetDifference(announced, expected),
    };
    logVerbose('Inspect', 'Announced labels differ from reference', {
      missing: report.missing,
      unexpected: report.unexpected,
    });
    return report;
  }

  logPerformance('InspectAnnouncements', Date.now() - startTime, { line_count: lines.length });
  return { ...base, valid: true };
}

export function verify(output: string): boolean {
  return inspectAnnouncements(output).valid;
}
