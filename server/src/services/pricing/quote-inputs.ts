/**
 * Quote Inputs DTO and Zod schema
 * Single construction step: decode + normalize untyped payloads into QuoteInputs
 */

import { z } from 'zod';
import { ValidationError, type ValidationIssue } from './pricing.errors.js';
import type { QuoteInputs } from './pricing.types.js';

export const NO_LABEL = 'No label';
export const DEFAULT_CHAMFER_WIDTH_IN = 0.062;
export const MAX_PADDLE_DIA_IN = 48;

// Largest blank the saw bed takes
export const MAX_HANDLE_LENGTH_IN = 120;
export const MAX_HANDLE_WIDTH_IN = 48;

// ============================================================================
// Zod Schemas
// ============================================================================

export const quoteRequestSchema = z.object({
  quantity: z.number().int(),
  material: z.string().min(1),
  thickness: z.number(),
  handleWidth: z.number(),
  handleLengthFromBore: z.number(),
  paddleDia: z.number(),
  boreDia: z.number(),
  boreTolerance: z.number(),
  chamfer: z.boolean(),

  // Optional: filled from the active default lead time when omitted
  shipsInDays: z.number().int().optional(),

  // Optional: normalized below; checked only when chamfer is on
  chamferWidth: z.union([z.number(), z.literal(''), z.null()]).optional(),
  handleLabel: z.string().nullable().optional(),
}).superRefine((req, ctx) => {
  if (req.chamfer && typeof req.chamferWidth === 'number' && req.chamferWidth <= 0) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['chamferWidth'],
      message: 'chamferWidth must be a positive number when chamfer is on',
    });
  }
});

export interface CreateQuoteInputsOptions {
  defaultShipsInDays?: number;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Decode an untyped payload into frozen QuoteInputs
 * @throws {ValidationError} on missing or mistyped fields
 */
export function createQuoteInputs(raw: unknown, options: CreateQuoteInputsOptions = {}): QuoteInputs {
  const result = quoteRequestSchema.safeParse(raw);
  if (!result.success) {
    throw new ValidationError(result.error.issues.map(toValidationIssue));
  }

  const req = result.data;
  const shipsInDays = req.shipsInDays ?? options.defaultShipsInDays;
  if (shipsInDays === undefined) {
    throw new ValidationError([{ field: 'shipsInDays', reason: 'Required' }]);
  }

  return Object.freeze({
    quantity: req.quantity,
    material: req.material.trim(),
    thickness: req.thickness,
    handleWidth: req.handleWidth,
    handleLengthFromBore: req.handleLengthFromBore,
    paddleDia: req.paddleDia,
    boreDia: req.boreDia,
    boreTolerance: req.boreTolerance,
    chamfer: req.chamfer,
    chamferWidth: normalizeChamferWidth(req.chamfer, req.chamferWidth),
    shipsInDays,
    handleLabel: normalizeHandleLabel(req.handleLabel),
  });
}

export function normalizeHandleLabel(label: string | null | undefined): string {
  const trimmed = (label ?? '').trim();
  return trimmed || NO_LABEL;
}

export function normalizeChamferWidth(
  chamfer: boolean,
  width: number | '' | null | undefined
): number | null {
  if (!chamfer) {
    return null;
  }
  if (width === undefined || width === null || width === '') {
    return DEFAULT_CHAMFER_WIDTH_IN;
  }
  return width;
}

function toValidationIssue(issue: z.ZodIssue): ValidationIssue {
  const field = issue.path.length > 0 ? issue.path.join('.') : '(root)';
  return { field, reason: issue.message };
}
