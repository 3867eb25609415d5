/**
 * Pricing Errors
 *
 * Two kinds only:
 * - validation: caller-supplied inputs break an invariant (client fault)
 * - configuration: the effective knobs are inconsistent (server fault)
 */

export type PricingErrorKind = 'validation' | 'configuration';

export interface ValidationIssue {
  field: string;
  reason: string;
  relatedFields?: string[];
}

export abstract class PricingError extends Error {
  abstract readonly kind: PricingErrorKind;
}

export class ValidationError extends PricingError {
  readonly kind = 'validation' as const;

  constructor(public readonly issues: ValidationIssue[]) {
    super(issues.map(i => `${i.field}: ${i.reason}`).join('; '));
    this.name = 'ValidationError';
  }

  /**
   * Every field referenced by an issue, in first-seen order
   */
  get fields(): string[] {
    const seen = new Set<string>();
    for (const issue of this.issues) {
      seen.add(issue.field);
      for (const related of issue.relatedFields ?? []) {
        seen.add(related);
      }
    }
    return [...seen];
  }
}

export class ConfigurationError extends PricingError {
  readonly kind = 'configuration' as const;

  constructor(public readonly reason: string) {
    super(reason);
    this.name = 'ConfigurationError';
  }
}

export function isPricingError(error: unknown): error is PricingError {
  return error instanceof PricingError;
}
