/**
 * Input validation and environment configuration tests.
 *
 * Run with: npx tsx --test tests/cutlist-validation.test.ts
 */

import test from 'node:test';
import assert from 'node:assert/strict';

import { loadCutlistConfig } from '@/lib/cutlist/config';
import { CutlistInputError } from '@/lib/cutlist/errors';
import type { CutlistPart, SheetTemplate } from '@/lib/cutlist/types';
import {
  formatPath,
  parseOptimizeRequest,
  parseParts,
  parseSheetTemplate,
} from '@/lib/cutlist/validation';

const SHEET: SheetTemplate = { width: 2750, height: 1830, materialRef: 'mdf', thickness: 16 };

function shelf(overrides: Partial<CutlistPart> = {}): CutlistPart {
  return { name: 'Shelf', length: 800, width: 300, thickness: 16, quantity: 2, materialRef: 'mdf', ...overrides };
}

function inputError(fn: () => unknown): CutlistInputError {
  try {
    fn();
  } catch (err) {
    assert.ok(err instanceof CutlistInputError, `expected CutlistInputError, got ${String(err)}`);
    return err;
  }
  assert.fail('expected the call to throw');
}

// ============================================================================
// Requests
// ============================================================================

test('valid requests are normalised with defaults', () => {
  const request = parseOptimizeRequest({ components: [shelf()], sheet: SHEET, algorithm: 'guillotine_split' });

  assert.deepEqual(request.components, [
    { name: 'Shelf', length: 800, width: 300, thickness: 16, quantity: 2, materialRef: 'mdf', rotatable: true, priority: 1 },
  ]);
  assert.deepEqual(request.sheet, { ...SHEET, kerfWidth: 3 });
  assert.equal(request.algorithm, 'guillotine_split');
});

test('numeric material references are accepted', () => {
  const request = parseOptimizeRequest({
    components: [shelf({ materialRef: 42 })],
    sheet: { ...SHEET, materialRef: 42 },
    algorithm: 'bottom_left_fill',
  });

  assert.equal(request.components[0].materialRef, 42);
});

test('a zero quantity names the part and the field', () => {
  const err = inputError(() =>
    parseOptimizeRequest({ components: [shelf({ quantity: 0 })], sheet: SHEET, algorithm: 'bottom_left_fill' })
  );

  assert.equal(err.field, 'components[0].quantity');
  assert.equal(err.value, 0);
  assert.equal(
    err.message,
    'Invalid components[0].quantity (part "Shelf"): Number must be greater than 0 (received 0)'
  );
});

test('fractional quantities are rejected', () => {
  const err = inputError(() =>
    parseOptimizeRequest({ components: [shelf(), shelf({ name: 'Top', quantity: 1.5 })], sheet: SHEET, algorithm: 'bottom_left_fill' })
  );

  assert.equal(err.field, 'components[1].quantity');
  assert.equal(err.value, 1.5);
});

test('non-positive part dimensions are rejected', () => {
  const err = inputError(() =>
    parseOptimizeRequest({ components: [shelf({ width: -300 })], sheet: SHEET, algorithm: 'bottom_left_fill' })
  );

  assert.equal(err.field, 'components[0].width');
  assert.equal(err.value, -300);
});

test('a zero sheet width is rejected', () => {
  const err = inputError(() =>
    parseOptimizeRequest({ components: [shelf()], sheet: { ...SHEET, width: 0 }, algorithm: 'bottom_left_fill' })
  );

  assert.equal(err.field, 'sheet.width');
  assert.equal(err.value, 0);
});

test('negative kerf is rejected', () => {
  const err = inputError(() =>
    parseOptimizeRequest({ components: [shelf()], sheet: { ...SHEET, kerfWidth: -1 }, algorithm: 'bottom_left_fill' })
  );

  assert.equal(err.field, 'sheet.kerfWidth');
});

test('unknown algorithms are rejected rather than defaulted', () => {
  const err = inputError(() =>
    parseOptimizeRequest({ components: [shelf()], sheet: SHEET, algorithm: 'simulated_annealing' })
  );

  assert.equal(err.field, 'algorithm');
  assert.equal(err.value, 'simulated_annealing');
});

test('thickness mismatches are reported per part', () => {
  const err = inputError(() =>
    parseOptimizeRequest({
      components: [shelf(), shelf({ name: 'Back', thickness: 3 })],
      sheet: SHEET,
      algorithm: 'bottom_left_fill',
    })
  );

  assert.equal(err.field, 'components[1].thickness');
  assert.equal(err.value, 3);
  assert.equal(
    err.message,
    'Invalid components[1].thickness (part "Back"): Part "Back" is 3mm thick but the sheet is 16mm (received 3)'
  );
});

test('repeated part names are rejected', () => {
  const err = inputError(() =>
    parseOptimizeRequest({
      components: [shelf({ length: 600 }), shelf({ length: 500, width: 200 })],
      sheet: SHEET,
      algorithm: 'bottom_left_fill',
    })
  );

  assert.equal(err.field, 'components[1].name');
  assert.equal(err.value, 'Shelf');
  assert.equal(
    err.message,
    'Invalid components[1].name (part "Shelf"): Part name "Shelf" is already used by components[0] (received "Shelf")'
  );
});

test('every issue is kept on the error', () => {
  const err = inputError(() =>
    parseOptimizeRequest({
      components: [shelf({ quantity: 0, materialRef: 'oak' })],
      sheet: SHEET,
      algorithm: 'bottom_left_fill',
    })
  );

  assert.deepEqual(
    err.issues.map((issue) => issue.path),
    ['components[0].quantity', 'components[0].materialRef']
  );
});

// ============================================================================
// Standalone Parsers
// ============================================================================

test('parseParts fills rotation and priority defaults', () => {
  const [parsed] = parseParts([shelf({ rotatable: false })]);

  assert.equal(parsed.rotatable, false);
  assert.equal(parsed.priority, 1);
});

test('parseSheetTemplate keeps an explicit kerf', () => {
  assert.equal(parseSheetTemplate({ ...SHEET, kerfWidth: 0 }).kerfWidth, 0);
  assert.equal(inputError(() => parseSheetTemplate({ ...SHEET, height: Number.NaN })).field, 'height');
});

test('formatPath renders array indices in brackets', () => {
  assert.equal(formatPath(['components', 3, 'name']), 'components[3].name');
  assert.equal(formatPath([0, 'width']), '[0].width');
  assert.equal(formatPath([]), '(root)');
});

// ============================================================================
// Environment Configuration
// ============================================================================

test('an empty environment yields the defaults', () => {
  assert.deepEqual(loadCutlistConfig({}), {
    kerfWidth: 3,
    maxCandidateEvaluations: undefined,
    debug: false,
  });
});

test('environment values are parsed', () => {
  assert.deepEqual(
    loadCutlistConfig({
      CUTLIST_KERF_MM: '4.5',
      CUTLIST_MAX_CANDIDATE_EVALUATIONS: '5000',
      CUTLIST_DEBUG: '1',
    }),
    { kerfWidth: 4.5, maxCandidateEvaluations: 5000, debug: true }
  );
});

test('blank environment values fall back to the defaults', () => {
  assert.deepEqual(
    loadCutlistConfig({ CUTLIST_KERF_MM: '', CUTLIST_MAX_CANDIDATE_EVALUATIONS: '' }),
    { kerfWidth: 3, maxCandidateEvaluations: undefined, debug: false }
  );
  assert.equal(loadCutlistConfig({ CUTLIST_KERF_MM: '  ' }).kerfWidth, 3);
  assert.equal(loadCutlistConfig({ CUTLIST_KERF_MM: '0' }).kerfWidth, 0);
});

test('invalid environment values are rejected', () => {
  assert.equal(inputError(() => loadCutlistConfig({ CUTLIST_KERF_MM: '-1' })).field, 'CUTLIST_KERF_MM');
  assert.equal(
    inputError(() => loadCutlistConfig({ CUTLIST_MAX_CANDIDATE_EVALUATIONS: 'abc' })).field,
    'CUTLIST_MAX_CANDIDATE_EVALUATIONS'
  );
  assert.equal(inputError(() => loadCutlistConfig({ CUTLIST_DEBUG: 'yes' })).field, 'CUTLIST_DEBUG');
});
