// Validation result types

/**
 * A single validation finding
 */
export interface ValidationIssue {
  /** Field, slot or output section the finding refers to */
  field: string;
  /** Human-readable message */
  message: string;
  /** 1-indexed line in the checked text, when known */
  line?: number;
}

/**
 * Result of validating input or generated output
 */
export interface ValidationResult {
  /** True when there are no errors; warnings never invalidate */
  valid: boolean;
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}
