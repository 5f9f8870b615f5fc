// Parsed audit report model

import type { ValidationResult } from './validation.js';

export interface AuditScore {
  /** Category id from the contract, or the overall score id */
  categoryId: string;
  label: string;
  value: number;
  line: number;
}

export interface AuditFinding {
  category: string;
  /** Severity id from the contract (e.g. "critical"), undefined when unrecognized */
  severity?: string;
  /** Rank of the severity, 0 when unrecognized */
  severityRank: number;
  /** Severity cell as written */
  severityLabel: string;
  impact: string;
  evidence: string;
  recommendation: string;
  line: number;
}

export interface ParsedAuditReport {
  /** Section id to section text, for the sections that were found */
  sections: Record<string, string>;
  summaryLines: string[];
  scores: AuditScore[];
  overall?: AuditScore;
  findings: AuditFinding[];
  /** Horizon ids found in the backlog, in document order */
  horizons: string[];
}

export interface AuditValidationResult extends ValidationResult {
  report: ParsedAuditReport;
}
