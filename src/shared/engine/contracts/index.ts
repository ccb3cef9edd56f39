/**
 * Contracts module: zod schemas and JSON serialization for values that
 * cross the engine boundary.
 */

export {
  ZodSideSchema,
  ZodPieceTypeSchema,
  ZodPieceFaceSchema,
  ZodTerminalReasonSchema,
  ZodSquareSchema,
  ZodMoveSchema,
  ZodSquareContentSchema,
  ZodHandSchema,
  ZodSerializedPositionSchema,
  formatZodError,
  createValidator,
  validateMove,
  parseMove,
  validateSerializedPosition,
  parseSerializedPosition,
} from './validators';
export type {
  ZodMove,
  SerializedPosition,
  ParsedSerializedPosition,
  ValidationResult,
} from './validators';

export {
  serializePosition,
  deserializePosition,
  positionToJson,
  positionFromJson,
} from './serialization';
