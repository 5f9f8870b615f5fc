// Commit message model

import type { ValidationResult } from './validation.js';

/**
 * Parsed `type(scope)!: summary` header
 */
export interface CommitHeader {
  type: string;
  scope?: string;
  breaking: boolean;
  summary: string;
}

/**
 * A git-trailer style footer line
 */
export interface CommitFooter {
  token: string;
  /** ": " or " #" */
  separator: ': ' | ' #';
  value: string;
  line: number;
}

export interface CommitMessage {
  /** 1-based position in the generated output */
  index: number;
  raw: string;
  header: string;
  /** Undefined when the header does not match the grammar */
  parsedHeader?: CommitHeader;
  body: string[];
  footers: CommitFooter[];
}

export interface CommitValidationResult extends ValidationResult {
  messages: CommitMessage[];
}
