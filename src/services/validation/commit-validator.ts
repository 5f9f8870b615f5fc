// Conventional Commits validator for generated and hand-written commit messages

import type { CommitFooter, CommitHeader, CommitMessage, CommitValidationResult } from '../../models/commit.js';
import type { CommitMessagesContract } from '../../models/template.js';
import type { Language } from '../../models/types.js';
import type { ValidationIssue } from '../../models/validation.js';
import { extractFencedBlocks, toLines } from './markdown.js';

/**
 * `type(scope)!: summary`
 */
const HEADER_RE = /^(?<type>[^\s():!]+)(?:\((?<scope>[^()]*)\))?(?<breaking>!)?: (?<summary>.*)$/;

/**
 * `Token: value` or `Token #value`; `BREAKING CHANGE` is the one token with a space
 */
const FOOTER_RE = /^(?<token>BREAKING CHANGE|[A-Za-z][A-Za-z0-9-]*)(?<separator>:[ \t]*| +#)(?<value>.*)$/;

/**
 * Start of an issue reference, well-formed or not; prose such as
 * "Fixes a crash" stays in the body
 */
const ISSUE_TOKEN_RE = /^(closes|fixes|resolves|refs)\s*(?::|#|\d)/i;

const ISSUE_TOKENS = new Set(['closes', 'fixes', 'resolves', 'refs']);
const BREAKING_TOKENS = new Set(['breaking change', 'breaking-change']);
const CO_AUTHOR_VALUE_RE = /^[^<>]*\S[^<>]*\s<[^<>\s@]+@[^<>\s@]+>$/;

const URL_RE = /\b[a-z][a-z0-9+.-]*:\/\/\S+/i;
const SCISSORS_RE = /^# -+ >8 -+$/;
const AUTOSQUASH_RE = /^(fixup|squash|amend)! /;
const MERGE_RE = /^(Merge |Revert ")/;

/**
 * English words ending like past tense, gerund or third person that are
 * still imperative
 */
const EN_IMPERATIVE_EXCEPTIONS = new Set([
  'embed', 'feed', 'need', 'seed', 'shed', 'speed', 'bleed', 'proceed', 'exceed', 'succeed',
  'bring', 'ring', 'sing', 'string', 'ping',
  'alias', 'bias', 'focus', 'access', 'process', 'pass', 'address', 'bypass', 'compress', 'discuss', 'express', 'suppress'
]);

export interface CommitValidationOptions {
  /** Number of messages the output must contain */
  expectedCount?: number;
  /** Language the messages are written in; both heuristics run when omitted */
  language?: Language;
}

/**
 * Parses a Conventional Commits header. Returns undefined when the header
 * does not follow `type(scope)!: summary`.
 */
export function parseHeader(header: string): CommitHeader | undefined {
  const match = HEADER_RE.exec(header);
  if (!match?.groups) return undefined;

  const { type, scope, breaking, summary } = match.groups;
  return {
    type,
    scope,
    breaking: breaking === '!',
    summary
  };
}

/**
 * Splits agent output into messages: one per fenced block, or the whole
 * output when it has no fences
 */
export function splitMessages(output: string): { text: string; lineOffset: number }[] {
  const blocks = extractFencedBlocks(output);
  if (blocks.length === 0) {
    return output.trim().length > 0 ? [{ text: output, lineOffset: 0 }] : [];
  }
  return blocks.map(block => ({ text: block.content, lineOffset: block.index + 1 }));
}

/**
 * Prepares a commit message file the way git does: drops `#` comment lines
 * and everything below the scissors line
 */
export function cleanCommitMessage(raw: string): string {
  const kept: string[] = [];
  for (const line of toLines(raw)) {
    if (SCISSORS_RE.test(line)) break;
    if (line.startsWith('#')) continue;
    kept.push(line);
  }
  return kept.join('\n').trim();
}

/**
 * Messages git writes itself and that are not linted
 */
export function isGeneratedCommitMessage(message: string): boolean {
  const header = toLines(message.trim())[0] ?? '';
  return MERGE_RE.test(header) || AUTOSQUASH_RE.test(header);
}

function nonImperativeEnglish(word: string): boolean {
  if (EN_IMPERATIVE_EXCEPTIONS.has(word)) return false;
  if (word.length > 3 && word.endsWith('ed')) return true;
  if (word.length > 4 && word.endsWith('ing')) return true;
  return word.length > 3 && word.endsWith('s') && !/(ss|us|is|as)$/.test(word);
}

function nonImperativePortuguese(word: string): boolean {
  if (word.length > 4 && word.endsWith('ndo')) return true;
  if (word.length > 4 && /(ado|ido)$/.test(word)) return true;
  return word.length > 4 && /(ou|iu|eu)$/.test(word);
}

/**
 * Describes why the first word of a summary does not look imperative, or
 * returns undefined
 */
export function nonImperativeReason(summary: string, language?: Language): string | undefined {
  const word = summary.trim().split(/\s+/)[0]?.toLowerCase() ?? '';
  if (!/^\p{L}+$/u.test(word)) return undefined;

  const checkEnglish = language === undefined || language === 'en';
  const checkPortuguese = language === undefined || language === 'pt-br';

  if (checkEnglish && nonImperativeEnglish(word)) {
    return `"${word}" does not look imperative (use "add", not "added", "adding" or "adds")`;
  }
  if (checkPortuguese && nonImperativePortuguese(word)) {
    return `"${word}" does not look imperative (use "adiciona", not "adicionando", "adicionado" or "adicionou")`;
  }
  return undefined;
}

function toFooter(line: string, lineNumber: number): CommitFooter | undefined {
  const match = FOOTER_RE.exec(line);
  if (!match?.groups) return undefined;
  return {
    token: match.groups.token,
    separator: match.groups.separator.startsWith(':') ? ': ' : ' #',
    value: match.groups.value.trim(),
    line: lineNumber
  };
}

/**
 * Checks commit messages against a commit-messages contract
 */
export class CommitMessageValidator {
  private readonly knownTokens: Set<string>;

  constructor(private readonly contract: CommitMessagesContract) {
    this.knownTokens = new Set(contract.footerTokens.map(t => t.toLowerCase()));
  }

  /**
   * Validates agent output holding one or more messages
   */
  validate(output: string, options: CommitValidationOptions = {}): CommitValidationResult {
    const errors: ValidationIssue[] = [];
    const warnings: ValidationIssue[] = [];
    const { minVariants, maxVariants } = this.contract;
    const parts = splitMessages(output);

    if (options.expectedCount !== undefined) {
      if (options.expectedCount < minVariants || options.expectedCount > maxVariants) {
        errors.push({
          field: 'variantCount',
          message: `Requested ${options.expectedCount} message(s); allowed range is ${minVariants}-${maxVariants}`
        });
      }
      if (parts.length !== options.expectedCount) {
        errors.push({ field: 'messages', message: `Expected ${options.expectedCount} message(s), found ${parts.length}` });
      }
    } else if (parts.length < minVariants || parts.length > maxVariants) {
      errors.push({ field: 'messages', message: `Found ${parts.length} message(s); expected ${minVariants}-${maxVariants}` });
    }

    const messages = parts.map((part, i) =>
      this.checkMessage(part.text, i + 1, part.lineOffset, options.language, errors, warnings)
    );

    return { valid: errors.length === 0, errors, warnings, messages };
  }

  /**
   * Validates a single commit message as git would record it
   */
  lintMessage(raw: string, language?: Language): CommitValidationResult {
    const errors: ValidationIssue[] = [];
    const warnings: ValidationIssue[] = [];
    const message = this.checkMessage(cleanCommitMessage(raw), 1, 0, language, errors, warnings);
    return { valid: errors.length === 0, errors, warnings, messages: [message] };
  }

  private checkMessage(
    text: string,
    index: number,
    lineOffset: number,
    language: Language | undefined,
    errors: ValidationIssue[],
    warnings: ValidationIssue[]
  ): CommitMessage {
    const field = `messages[${index}]`;
    const all = toLines(text);

    // Surrounding blank lines are not part of the message
    let first = 0;
    while (first < all.length && all[first].trim() === '') first++;
    let last = all.length - 1;
    while (last >= first && all[last].trim() === '') last--;

    const lines = all.slice(first, last + 1).map(l => l.trimEnd());
    const lineAt = (i: number): number => lineOffset + first + i + 1;
    const header = lines[0] ?? '';
    const message: CommitMessage = { index, raw: lines.join('\n'), header, body: [], footers: [] };

    if (lines.length === 0) {
      errors.push({ field, message: 'Message is empty', line: lineOffset + 1 });
      return message;
    }

    message.parsedHeader = this.checkHeader(header, field, lineAt(0), language, errors, warnings);

    if (lines.length > 1 && lines[1].trim() !== '') {
      errors.push({ field, message: 'Header must be followed by a blank line', line: lineAt(1) });
    }

    // The last paragraph holds the footers when it starts like one
    let footerStart = lines.length;
    let start = lines.length - 1;
    while (start > 1 && lines[start - 1].trim() !== '') start--;
    if (start >= 1 && lines[start].trim() !== '' && (FOOTER_RE.test(lines[start]) || ISSUE_TOKEN_RE.test(lines[start]))) {
      footerStart = start;
    }

    message.body = lines.slice(1, footerStart);
    while (message.body.length > 0 && message.body[0].trim() === '') message.body.shift();
    while (message.body.length > 0 && message.body[message.body.length - 1].trim() === '') message.body.pop();

    for (let i = 1; i < footerStart; i++) {
      const line = lines[i];
      if (line.length > this.contract.bodyWrapColumn && !URL_RE.test(line)) {
        warnings.push({
          field,
          message: `Body line is ${line.length} characters; wrap at ${this.contract.bodyWrapColumn}`,
          line: lineAt(i)
        });
      }
    }

    for (let i = footerStart; i < lines.length; i++) {
      const footer = toFooter(lines[i], lineAt(i));
      if (footer) {
        message.footers.push(footer);
        continue;
      }
      if (ISSUE_TOKEN_RE.test(lines[i])) {
        errors.push({ field, message: `Malformed issue reference "${lines[i]}" (use "Closes #12")`, line: lineAt(i) });
        continue;
      }
      // Continuation of the previous footer's value
      const previous = message.footers[message.footers.length - 1];
      if (previous) {
        previous.value = `${previous.value}\n${lines[i].trim()}`.trim();
      }
    }

    for (const footer of message.footers) {
      this.checkFooter(footer, field, errors, warnings);
    }

    return message;
  }

  private checkHeader(
    header: string,
    field: string,
    line: number,
    language: Language | undefined,
    errors: ValidationIssue[],
    warnings: ValidationIssue[]
  ): CommitHeader | undefined {
    const length = [...header].length;
    if (length > this.contract.headerMaxLength) {
      errors.push({ field, message: `Header is ${length} characters; the limit is ${this.contract.headerMaxLength}`, line });
    }

    const parsed = parseHeader(header);
    if (!parsed) {
      errors.push({ field, message: `Header "${header}" does not match "type(scope): summary"`, line });
      return undefined;
    }

    if (!this.contract.types.includes(parsed.type)) {
      errors.push({ field, message: `Unknown type "${parsed.type}". Allowed: ${this.contract.types.join(', ')}`, line });
    }
    if (parsed.scope !== undefined && parsed.scope.trim() === '') {
      errors.push({ field, message: 'Scope is empty; drop the parentheses or name a scope', line });
    }

    const summary = parsed.summary;
    if (summary.trim() === '') {
      errors.push({ field, message: 'Summary is empty', line });
      return parsed;
    }
    if (summary !== summary.trim()) {
      errors.push({ field, message: 'Summary has surrounding whitespace', line });
    }
    if (summary.trimEnd().endsWith('.')) {
      errors.push({ field, message: 'Summary must not end with a period', line });
    }
    if (/^\p{Lu}/u.test(summary.trimStart())) {
      errors.push({ field, message: 'Summary must start with a lowercase letter', line });
    }

    const reason = nonImperativeReason(summary, language);
    if (reason) {
      warnings.push({ field, message: `Summary should be imperative: ${reason}`, line });
    }

    return parsed;
  }

  private checkFooter(footer: CommitFooter, field: string, errors: ValidationIssue[], warnings: ValidationIssue[]): void {
    const token = footer.token.toLowerCase();

    if (!this.knownTokens.has(token)) {
      warnings.push({ field, message: `Unrecognized footer token "${footer.token}"`, line: footer.line });
    }

    if (BREAKING_TOKENS.has(token)) {
      if (footer.separator !== ': ' || footer.value === '') {
        errors.push({ field, message: `${footer.token} needs migration guidance after "${footer.token}: "`, line: footer.line });
      }
      return;
    }

    if (ISSUE_TOKENS.has(token)) {
      const wellFormed = footer.separator === ' #' ? /^\d+$/.test(footer.value) : /^#\d+$/.test(footer.value);
      if (!wellFormed) {
        errors.push({ field, message: `Malformed issue reference "${footer.token}${footer.separator}${footer.value}" (use "${footer.token} #12")`, line: footer.line });
      }
      return;
    }

    if (token === 'co-authored-by' && (footer.separator !== ': ' || !CO_AUTHOR_VALUE_RE.test(footer.value))) {
      errors.push({ field, message: 'Co-authored-by must be "Name <email>"', line: footer.line });
    }
  }
}
