// Audit report validator

import type { AuditFinding, AuditScore, AuditValidationResult, ParsedAuditReport } from '../../models/audit.js';
import type { AuditReportContract, LabeledEntry } from '../../models/template.js';
import type { ValidationIssue } from '../../models/validation.js';
import {
  findSection,
  findTable,
  matchesLabel,
  parseHeadings,
  splitTableRow,
  toLines,
  type LocatedSection,
  type MarkdownHeading
} from './markdown.js';

/**
 * `- Label: 85/100`, `1. **Label** - 85`, `Label = 85`
 */
const SCORE_LINE_RE = /^\s*(?:[-*+]\s+|\d+[.)]\s+)?(.+?)\s*(?::|=|\s[-–]\s)\s*(.+)$/;

/**
 * Leading number of a score cell, with an optional `/max`
 */
const SCORE_VALUE_RE = /^[*_\s]*(-?\d+(?:[.,]\d+)?)[*_\s]*(?:\/\s*\d+)?/;

const LIST_MARKER_RE = /^\s*(?:[-*+]\s+(?:\[[ xX]\]\s+)?|\d+[.)]\s+)/;

/**
 * A line that is nothing but bold text, used as a pseudo-heading
 */
const BOLD_LINE_RE = /^\s*(?:[-*+]\s+)?\*\*([^*]+)\*\*\s*:?\s*$/;

function firstLabel(entry: LabeledEntry): string {
  return entry.labels[0] ?? entry.id;
}

function findEntry<T extends LabeledEntry>(text: string, entries: readonly T[]): T | undefined {
  return entries.find(e => matchesLabel(text, e.labels));
}

/**
 * Sorts findings from the most to the least severe, keeping document order
 * within a severity
 */
export function sortFindingsBySeverity(findings: readonly AuditFinding[]): AuditFinding[] {
  return [...findings].sort((a, b) => b.severityRank - a.severityRank);
}

/**
 * Checks a generated audit report against an audit-report contract
 */
export class AuditReportValidator {
  constructor(private readonly contract: AuditReportContract) {}

  validate(output: string): AuditValidationResult {
    const errors: ValidationIssue[] = [];
    const warnings: ValidationIssue[] = [];
    const lines = toLines(output);
    const headings = parseHeadings(lines);

    const report: ParsedAuditReport = {
      sections: {},
      summaryLines: [],
      scores: [],
      findings: [],
      horizons: []
    };

    const located = new Map<string, LocatedSection>();
    for (const section of this.contract.sections) {
      const found = findSection(lines, headings, section.headings);
      if (!found) {
        const issue = { field: `sections.${section.id}`, message: `Missing section "${section.headings.join('" / "')}"` };
        (section.required ? errors : warnings).push(issue);
        continue;
      }
      located.set(section.id, found);
      report.sections[section.id] = found.lines.join('\n').trim();
    }

    const summary = located.get('executiveSummary');
    if (summary) {
      report.summaryLines = summary.lines.filter(l => l.trim().length > 0);
      if (report.summaryLines.length > this.contract.summaryMaxLines) {
        errors.push({
          field: 'sections.executiveSummary',
          message: `Executive summary has ${report.summaryLines.length} lines; the limit is ${this.contract.summaryMaxLines}`,
          line: summary.heading.index + 1
        });
      }
    }

    const scores = located.get('scores');
    if (scores) {
      this.checkScores(scores, report, errors);
    }

    const findings = located.get('findings');
    if (findings) {
      this.checkFindings(findings, report, errors, warnings);
    }

    const backlog = located.get('backlog');
    if (backlog) {
      this.checkBacklog(backlog, headings, report, errors, warnings);
    }

    return { valid: errors.length === 0, errors, warnings, report };
  }

  /**
   * Reads `label: value` list lines, or a two-column table, from the scores section
   */
  private readScoreEntries(section: LocatedSection): { label: string; value: string; line: number }[] {
    const table = findTable(section.lines, section.startIndex);
    if (table) {
      return table.rows
        .filter(row => row.cells.length >= 2)
        .map(row => ({ label: row.cells[0], value: row.cells[1], line: row.index + 1 }));
    }

    const entries: { label: string; value: string; line: number }[] = [];
    section.lines.forEach((line, offset) => {
      const match = SCORE_LINE_RE.exec(line);
      if (match) {
        entries.push({ label: match[1], value: match[2], line: section.startIndex + offset + 1 });
      }
    });
    return entries;
  }

  private checkScores(section: LocatedSection, report: ParsedAuditReport, errors: ValidationIssue[]): void {
    const { scoreCategories, overallScore, scoreMax } = this.contract;
    const targets = [...scoreCategories, overallScore];
    const seen = new Map<string, AuditScore[]>();

    for (const entry of this.readScoreEntries(section)) {
      const target = findEntry(entry.label, targets);
      if (!target) continue;

      const field = `scores.${target.id}`;
      const match = SCORE_VALUE_RE.exec(entry.value);
      if (!match) {
        errors.push({ field, message: `Score for "${entry.label}" is not a number: ${entry.value}`, line: entry.line });
        continue;
      }

      const value = Number(match[1].replace(',', '.'));
      if (!Number.isInteger(value)) {
        errors.push({ field, message: `Score for "${entry.label}" must be an integer (got ${match[1]})`, line: entry.line });
        continue;
      }
      if (value < 0 || value > scoreMax) {
        errors.push({ field, message: `Score for "${entry.label}" must be between 0 and ${scoreMax} (got ${value})`, line: entry.line });
        continue;
      }

      const score: AuditScore = { categoryId: target.id, label: entry.label, value, line: entry.line };
      seen.set(target.id, [...(seen.get(target.id) ?? []), score]);
    }

    for (const target of targets) {
      const found = seen.get(target.id) ?? [];
      const field = `scores.${target.id}`;
      if (found.length === 0) {
        errors.push({ field, message: `Missing score for "${firstLabel(target)}"`, line: section.heading.index + 1 });
        continue;
      }
      if (found.length > 1) {
        errors.push({
          field,
          message: `Score for "${firstLabel(target)}" appears ${found.length} times`,
          line: found[1].line
        });
      }
      if (target.id === overallScore.id) {
        report.overall = found[0];
      } else {
        report.scores.push(found[0]);
      }
    }
  }

  private checkFindings(
    section: LocatedSection,
    report: ParsedAuditReport,
    errors: ValidationIssue[],
    warnings: ValidationIssue[]
  ): void {
    const { findingsColumns, severities } = this.contract;
    const expected = findingsColumns.map(firstLabel).join(' | ');
    const table = findTable(section.lines, section.startIndex);

    if (!table) {
      errors.push({ field: 'findings', message: `Findings table not found (expected columns: ${expected})`, line: section.heading.index + 1 });
      return;
    }

    const headerMatches = table.header.length === findingsColumns.length
      && findingsColumns.every((column, i) => matchesLabel(table.header[i], column.labels));
    if (!headerMatches) {
      errors.push({
        field: 'findings',
        message: `Findings table columns must be exactly: ${expected} (got: ${table.header.join(' | ')})`,
        line: table.index + 1
      });
      return;
    }

    if (table.rows.length === 0) {
      warnings.push({ field: 'findings', message: 'Findings table has no rows', line: table.index + 1 });
    }

    const position = new Map(findingsColumns.map((column, i) => [column.id, i]));
    const cell = (cells: string[], id: string): string => {
      const i = position.get(id);
      return i === undefined ? '' : cells[i] ?? '';
    };

    for (const row of table.rows) {
      const line = row.index + 1;
      if (row.cells.length !== findingsColumns.length) {
        errors.push({
          field: 'findings',
          message: `Findings row has ${row.cells.length} cells; expected ${findingsColumns.length}`,
          line
        });
        continue;
      }

      const severityLabel = cell(row.cells, 'severity');
      const severity = findEntry(severityLabel, severities);
      if (!severity) {
        errors.push({
          field: 'findings.severity',
          message: `Unknown severity "${severityLabel}". Allowed: ${severities.map(s => s.labels.join('/')).join(', ')}`,
          line
        });
      }

      report.findings.push({
        category: cell(row.cells, 'category'),
        severity: severity?.id,
        severityRank: severity?.rank ?? 0,
        severityLabel,
        impact: cell(row.cells, 'impact'),
        evidence: cell(row.cells, 'evidence'),
        recommendation: cell(row.cells, 'recommendation'),
        line
      });
    }
  }

  /**
   * Finds the horizon markers (sub-headings or bold lines) inside the backlog
   */
  private findHorizonMarkers(section: LocatedSection, headings: MarkdownHeading[]): { id: string; label: string; index: number }[] {
    const end = section.startIndex + section.lines.length;
    const markers: { id: string; label: string; index: number }[] = [];

    const inSection = new Map(
      headings
        .filter(h => h.index >= section.startIndex && h.index < end)
        .map(h => [h.index, h.title])
    );

    section.lines.forEach((line, offset) => {
      const index = section.startIndex + offset;
      const title = inSection.get(index) ?? BOLD_LINE_RE.exec(line)?.[1];
      if (title === undefined) return;

      const horizon = findEntry(title, this.contract.horizons);
      if (horizon) {
        markers.push({ id: horizon.id, label: title, index });
      }
    });

    return markers;
  }

  private checkBacklog(
    section: LocatedSection,
    headings: MarkdownHeading[],
    report: ParsedAuditReport,
    errors: ValidationIssue[],
    warnings: ValidationIssue[]
  ): void {
    const markers = this.findHorizonMarkers(section, headings);
    const end = section.startIndex + section.lines.length;

    for (const horizon of this.contract.horizons) {
      if (!markers.some(m => m.id === horizon.id)) {
        errors.push({
          field: `backlog.${horizon.id}`,
          message: `Backlog horizon "${horizon.labels.join('" / "')}" is missing`,
          line: section.heading.index + 1
        });
      }
    }

    markers.forEach((marker, i) => {
      if (report.horizons.includes(marker.id)) return;
      report.horizons.push(marker.id);

      if (this.contract.backlogItemFields.length === 0) return;

      const blockEnd = i + 1 < markers.length ? markers[i + 1].index : end;
      const block = section.lines.slice(marker.index - section.startIndex + 1, blockEnd - section.startIndex);
      const missing = this.contract.backlogItemFields.filter(field => !block.some(line => this.lineHasField(line, field)));

      if (missing.length > 0) {
        warnings.push({
          field: `backlog.${marker.id}`,
          message: `Items under "${marker.label}" lack: ${missing.map(firstLabel).join(', ')}`,
          line: marker.index + 1
        });
      }
    });
  }

  private lineHasField(line: string, field: LabeledEntry): boolean {
    if (line.includes('|')) {
      return splitTableRow(line).some(cell => matchesLabel(cell, field.labels));
    }
    return matchesLabel(line.replace(LIST_MARKER_RE, ''), field.labels);
  }
}
