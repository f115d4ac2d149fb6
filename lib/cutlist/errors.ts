/**
 * Errors raised by the cutting optimizer. Every failure is thrown
 * synchronously to the caller of `optimize`; a run either returns a complete
 * report or throws one of these.
 */

export class CutlistError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CutlistError';
  }
}

export interface InputIssue {
  /** Dotted field path, e.g. `components[2].quantity` */
  path: string;
  message: string;
}

/**
 * Input rejected before packing started (bad dimension, quantity, algorithm...).
 * `field` and `value` describe the first offending field.
 */
export class CutlistInputError extends CutlistError {
  readonly field: string;
  readonly value: unknown;
  readonly issues: InputIssue[];

  constructor(message: string, field: string, value: unknown, issues: InputIssue[] = []) {
    super(message);
    this.name = 'CutlistInputError';
    this.field = field;
    this.value = value;
    this.issues = issues.length > 0 ? issues : [{ path: field, message }];
  }
}

export interface UnplaceablePiece {
  id: string;
  name: string;
  width: number;
  height: number;
  rotatable: boolean;
}

/**
 * A piece that does not fit an empty sheet in any allowed orientation.
 */
export class UnplaceablePieceError extends CutlistError {
  readonly piece: UnplaceablePiece;
  readonly sheet: { width: number; height: number };

  constructor(piece: UnplaceablePiece, sheet: { width: number; height: number }) {
    const orientations = piece.rotatable ? 'either orientation' : 'its fixed grain orientation';
    super(
      `Piece "${piece.name}" (${piece.id}, ${piece.width}×${piece.height}mm) does not fit ` +
        `a ${sheet.width}×${sheet.height}mm sheet in ${orientations}`
    );
    this.name = 'UnplaceablePieceError';
    this.piece = piece;
    this.sheet = sheet;
  }

  static forRectangle(
    rect: UnplaceablePiece,
    sheet: { width: number; height: number }
  ): UnplaceablePieceError {
    return new UnplaceablePieceError(
      { id: rect.id, name: rect.name, width: rect.width, height: rect.height, rotatable: rect.rotatable },
      { width: sheet.width, height: sheet.height }
    );
  }
}

/**
 * The run performed more placement checks than `maxCandidateEvaluations` allows.
 */
export class PackingBudgetExceededError extends CutlistError {
  readonly limit: number;

  constructor(limit: number) {
    super(`Packing stopped after ${limit} candidate evaluations`);
    this.name = 'PackingBudgetExceededError';
    this.limit = limit;
  }
}
