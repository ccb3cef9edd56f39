/**
 * Zod-based runtime validation for values crossing the engine boundary
 * (JSON files, scripts, other processes).
 *
 * Each schema has two validation functions:
 * - validate*: Returns { success: true, data } | { success: false, error }
 * - parse*: Throws on invalid data, returns typed data on success
 */

import { z } from 'zod';
import type { Piece } from '../../types/shogi';
import { SQUARE_COUNT } from '../coordinates';

// ═══════════════════════════════════════════════════════════════════════════
// Vocabulary Schemas
// ═══════════════════════════════════════════════════════════════════════════

export const ZodSideSchema = z.enum(['sente', 'gote']);

export const ZodPieceTypeSchema = z.enum([
  'pawn',
  'lance',
  'knight',
  'silver',
  'gold',
  'bishop',
  'rook',
  'king',
]);

export const ZodPieceFaceSchema = z.enum([
  'pawn',
  'lance',
  'knight',
  'silver',
  'gold',
  'bishop',
  'rook',
  'king',
  'promoted_pawn',
  'promoted_lance',
  'promoted_knight',
  'promoted_silver',
  'horse',
  'dragon',
]);

export const ZodTerminalReasonSchema = z.enum([
  'resignation',
  'checkmate',
  'king_left_en_prise',
  'illegal_move',
  'repetition',
]);

export const ZodSquareSchema = z
  .number()
  .int()
  .min(0)
  .max(SQUARE_COUNT - 1);

// ═══════════════════════════════════════════════════════════════════════════
// Move Schema & Validators
// ═══════════════════════════════════════════════════════════════════════════

export const ZodMoveSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('move'),
    side: ZodSideSchema,
    from: ZodSquareSchema,
    to: ZodSquareSchema,
    face: ZodPieceFaceSchema,
    promote: z.boolean(),
  }),
  z.object({
    type: z.literal('drop'),
    side: ZodSideSchema,
    to: ZodSquareSchema,
    piece: ZodPieceTypeSchema,
  }),
  z.object({
    type: z.literal('terminal'),
    reason: ZodTerminalReasonSchema,
    winner: ZodSideSchema.nullable(),
  }),
]);

export type ZodMove = z.infer<typeof ZodMoveSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// Serialized Position Schema
// ═══════════════════════════════════════════════════════════════════════════

/** An occupied square is written `"<side>:<face>"`, e.g. `"gote:dragon"`. */
export const ZodSquareContentSchema = z
  .string()
  .transform((text, ctx): Piece => {
    const parts = text.split(':');
    const side = ZodSideSchema.safeParse(parts[0]);
    const face = ZodPieceFaceSchema.safeParse(parts[1]);
    if (parts.length !== 2 || !side.success || !face.success) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected "<side>:<face>", received "${text}"`,
      });
      return z.NEVER;
    }
    return { side: side.data, face: face.data };
  })
  .nullable();

export const ZodHandSchema = z.record(ZodPieceTypeSchema, z.number().int().min(0));

export const ZodSerializedPositionSchema = z.object({
  squares: z.array(ZodSquareContentSchema).length(SQUARE_COUNT),
  hands: z.object({
    sente: ZodHandSchema,
    gote: ZodHandSchema,
  }),
  sideToMove: ZodSideSchema,
});

/** JSON shape of a position. */
export type SerializedPosition = z.input<typeof ZodSerializedPositionSchema>;

/** A serialized position after validation, squares decoded to pieces. */
export type ParsedSerializedPosition = z.output<typeof ZodSerializedPositionSchema>;

// ═══════════════════════════════════════════════════════════════════════════
// Error Formatting Helper
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Format a Zod error into a human-readable string.
 */
export function formatZodError(error: z.ZodError): string {
  if (error.issues.length === 0) {
    return 'Invalid data';
  }
  return error.issues
    .map((issue) => {
      const pathPrefix = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${pathPrefix}${issue.message}`;
    })
    .join('; ');
}

// ═══════════════════════════════════════════════════════════════════════════
// Validation Result Type
// ═══════════════════════════════════════════════════════════════════════════

export type ValidationResult<T> = { success: true; data: T } | { success: false; error: string };

// ═══════════════════════════════════════════════════════════════════════════
// Generic Validation Wrapper
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Create a validation function for any Zod schema.
 * Returns a tuple of [validate, parse] functions.
 */
export function createValidator<T extends z.ZodTypeAny>(
  schema: T
): [(data: unknown) => ValidationResult<z.output<T>>, (data: unknown) => z.output<T>] {
  const validate = (data: unknown): ValidationResult<z.output<T>> => {
    const result = schema.safeParse(data);
    if (!result.success) {
      return { success: false, error: formatZodError(result.error) };
    }
    return { success: true, data: result.data };
  };

  const parse = (data: unknown): z.output<T> => {
    return schema.parse(data);
  };

  return [validate, parse];
}

export const [validateMove, parseMove] = createValidator(ZodMoveSchema);

export const [validateSerializedPosition, parseSerializedPosition] =
  createValidator(ZodSerializedPositionSchema);
