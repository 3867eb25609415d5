/**
 * Quote Input Validation
 * Collects every violated invariant before any cost is computed
 */

import { ValidationError, type ValidationIssue } from './pricing.errors.js';
import { MAX_HANDLE_LENGTH_IN, MAX_HANDLE_WIDTH_IN, MAX_PADDLE_DIA_IN } from './quote-inputs.js';
import type { PricingConfiguration, QuoteInputs } from './pricing.types.js';

export function validateQuoteInputs(inputs: QuoteInputs, config: PricingConfiguration): void {
  const issues: ValidationIssue[] = [];

  if (!Number.isSafeInteger(inputs.quantity) || inputs.quantity < 1) {
    issues.push({ field: 'quantity', reason: 'quantity must be a safe integer >= 1' });
  }

  const priceByThickness = config.pricePerSqIn[inputs.material];
  if (!priceByThickness) {
    issues.push({ field: 'material', reason: `unknown or unavailable material: ${inputs.material}` });
  } else if (priceByThickness[inputs.thickness] === undefined) {
    issues.push({
      field: 'thickness',
      reason: `no price for thickness ${inputs.thickness} in material ${inputs.material}`,
    });
  }

  if (config.process.inspectionMinsByTolerance[inputs.boreTolerance] === undefined) {
    issues.push({ field: 'boreTolerance', reason: `unsupported bore tolerance: ${inputs.boreTolerance}` });
  }

  if (config.leadTimeMultiplier[inputs.shipsInDays] === undefined) {
    issues.push({ field: 'shipsInDays', reason: `unsupported shipsInDays: ${inputs.shipsInDays}` });
  }

  const dimensions = ['handleWidth', 'handleLengthFromBore', 'paddleDia', 'boreDia'] as const;
  const invalidDims = new Set<string>();
  for (const field of dimensions) {
    const value = inputs[field];
    if (!Number.isFinite(value) || value <= 0) {
      invalidDims.add(field);
      issues.push({ field, reason: `${field} must be a positive number` });
    }
  }

  // Cross-field checks only make sense on sane dimensions
  if (!invalidDims.has('boreDia') && !invalidDims.has('paddleDia') && inputs.boreDia >= inputs.paddleDia) {
    issues.push({
      field: 'boreDia',
      reason: 'boreDia must be smaller than paddleDia',
      relatedFields: ['paddleDia'],
    });
  }

  if (
    !invalidDims.has('handleLengthFromBore') &&
    !invalidDims.has('paddleDia') &&
    inputs.handleLengthFromBore <= inputs.paddleDia / 2
  ) {
    issues.push({
      field: 'handleLengthFromBore',
      reason: 'handleLengthFromBore must exceed the paddle radius (paddleDia / 2)',
      relatedFields: ['paddleDia'],
    });
  }

  if (!invalidDims.has('paddleDia') && inputs.paddleDia > MAX_PADDLE_DIA_IN) {
    issues.push({ field: 'paddleDia', reason: `paddleDia must be <= ${MAX_PADDLE_DIA_IN}` });
  }

  if (!invalidDims.has('handleLengthFromBore') && inputs.handleLengthFromBore > MAX_HANDLE_LENGTH_IN) {
    issues.push({ field: 'handleLengthFromBore', reason: `handleLengthFromBore must be <= ${MAX_HANDLE_LENGTH_IN}` });
  }

  if (!invalidDims.has('handleWidth') && inputs.handleWidth > MAX_HANDLE_WIDTH_IN) {
    issues.push({ field: 'handleWidth', reason: `handleWidth must be <= ${MAX_HANDLE_WIDTH_IN}` });
  }

  if (issues.length > 0) {
    throw new ValidationError(issues);
  }
}
