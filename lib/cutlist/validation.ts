/**
 * Input validation for optimizer runs.
 *
 * Every entry point parses its arguments through these schemas before any
 * packing starts. The first zod issue becomes the error's `field`/`value`;
 * all issues are kept on `CutlistInputError.issues`.
 */

import { z } from 'zod';

import { CutlistInputError, type InputIssue } from './errors';
import {
  PACKING_ALGORITHMS,
  type CutlistPart,
  type NormalizedPart,
  type NormalizedSheetTemplate,
  type PackingAlgorithm,
  type SheetTemplate,
} from './types';

export const DEFAULT_KERF_MM = 3;

const dimension = z.number().finite().positive();

export const materialRefSchema = z.union([z.string().min(1), z.number().finite()]);

export const partSchema = z.object({
  name: z.string().min(1),
  length: dimension,
  width: dimension,
  thickness: dimension,
  quantity: z.number().int().positive(),
  materialRef: materialRefSchema,
  rotatable: z.boolean().default(true),
  priority: z.number().int().default(1),
});

export const sheetTemplateSchema = z.object({
  width: dimension,
  height: dimension,
  materialRef: materialRefSchema,
  thickness: dimension,
  kerfWidth: z.number().finite().nonnegative().default(DEFAULT_KERF_MM),
});

export const algorithmSchema = z.enum(PACKING_ALGORITHMS);

export const optimizeRequestSchema = z
  .object({
    components: z.array(partSchema).min(1, 'At least one component is required'),
    sheet: sheetTemplateSchema,
    algorithm: algorithmSchema,
  })
  .superRefine((request, ctx) => {
    // Piece ids derive from part names, so a repeated name would repeat ids
    const firstIndexByName = new Map<string, number>();
    request.components.forEach((part, index) => {
      const firstIndex = firstIndexByName.get(part.name);
      if (firstIndex === undefined) {
        firstIndexByName.set(part.name, index);
      } else {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['components', index, 'name'],
          message: `Part name "${part.name}" is already used by components[${firstIndex}]`,
        });
      }
      if (part.materialRef !== request.sheet.materialRef) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['components', index, 'materialRef'],
          message: `Part "${part.name}" uses material ${String(part.materialRef)} but the sheet is ${String(request.sheet.materialRef)}`,
        });
      }
      if (part.thickness !== request.sheet.thickness) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['components', index, 'thickness'],
          message: `Part "${part.name}" is ${part.thickness}mm thick but the sheet is ${request.sheet.thickness}mm`,
        });
      }
    });
  });

export interface OptimizeRequest {
  components: NormalizedPart[];
  sheet: NormalizedSheetTemplate;
  algorithm: PackingAlgorithm;
}

// =============================================================================
// Issue Formatting
// =============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Read the raw input value a zod issue points at.
 */
function valueAtPath(input: unknown, path: ReadonlyArray<string | number>): unknown {
  let current: unknown = input;
  for (const key of path) {
    if (Array.isArray(current) && typeof key === 'number') {
      current = current[key];
    } else if (isRecord(current)) {
      current = current[String(key)];
    } else {
      return undefined;
    }
  }
  return current;
}

export function formatPath(path: ReadonlyArray<string | number>): string {
  let out = '';
  for (const key of path) {
    if (typeof key === 'number') out += `[${key}]`;
    else out += out ? `.${key}` : key;
  }
  return out || '(root)';
}

function describeValue(value: unknown): string {
  if (value === undefined) return 'undefined';
  const json = JSON.stringify(value);
  return json === undefined ? String(value) : json;
}

/**
 * Convert a failed parse into a `CutlistInputError`. When the failing field
 * belongs to a component, the component's name is included in the message.
 */
export function toInputError(error: z.ZodError, input: unknown): CutlistInputError {
  const issues: InputIssue[] = error.issues.map((issue) => ({
    path: formatPath(issue.path),
    message: issue.message,
  }));

  const first = error.issues[0];
  const field = formatPath(first.path);
  const value = valueAtPath(input, first.path);

  let owner = '';
  if (first.path[0] === 'components' && typeof first.path[1] === 'number') {
    const name = valueAtPath(input, ['components', first.path[1], 'name']);
    if (typeof name === 'string' && name) owner = ` (part "${name}")`;
  }

  return new CutlistInputError(
    `Invalid ${field}${owner}: ${first.message} (received ${describeValue(value)})`,
    field,
    value,
    issues
  );
}

// =============================================================================
// Parsers
// =============================================================================

export function parseOptimizeRequest(input: {
  components: readonly CutlistPart[];
  sheet: SheetTemplate;
  algorithm: string;
}): OptimizeRequest {
  const parsed = optimizeRequestSchema.safeParse(input);
  if (!parsed.success) {
    throw toInputError(parsed.error, input);
  }
  return parsed.data;
}

export function parseParts(parts: readonly CutlistPart[]): NormalizedPart[] {
  const parsed = z.array(partSchema).safeParse(parts);
  if (!parsed.success) {
    throw toInputError(parsed.error, parts);
  }
  return parsed.data;
}

export function parseSheetTemplate(template: SheetTemplate): NormalizedSheetTemplate {
  const parsed = sheetTemplateSchema.safeParse(template);
  if (!parsed.success) {
    throw toInputError(parsed.error, template);
  }
  return parsed.data;
}
