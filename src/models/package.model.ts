/**
 * Package Model
 *
 * Types shared by the package builder and the export validator.
 */

export type TargetFormat = 'qti' | 'csv';

export const TARGET_FORMATS: readonly TargetFormat[] = ['qti', 'csv'];

export function isTargetFormat(value: string): value is TargetFormat {
  return TARGET_FORMATS.some(candidate => candidate === value);
}

export type PackagingFailureReason =
  | 'NOTATION_ERROR'
  | 'UNSUPPORTED_TYPE'
  | 'CORRECT_ANSWER_NOT_IN_CHOICES'
  | 'NON_NUMERIC_ANSWER';

/**
 * A question that could not be rendered into the target format
 */
export interface PackagingFailure {
  questionId: string;
  reason: PackagingFailureReason;

  /** Field that failed, when one can be named */
  field?: string;
}

export interface PackageResult {
  format: TargetFormat;
  bytes: Buffer;

  /** Questions written into the package */
  itemCount: number;

  /** Questions left out (csv only; qti fails as a whole) */
  failures: PackagingFailure[];

  /** Archive entry names (qti) or the single table name (csv) */
  files: string[];
}

export type ExportIssueCode =
  | 'UNREADABLE_ARCHIVE'
  | 'MISSING_DOCUMENT'
  | 'MALFORMED_XML'
  | 'MISSING_ITEM'
  | 'UNEXPECTED_ITEM'
  | 'MANIFEST_MISMATCH'
  | 'CORRECT_MARKER_COUNT'
  | 'MALFORMED_TABLE'
  | 'MISSING_COLUMN'
  | 'ROW_COUNT_MISMATCH'
  | 'MISSING_ROW_ID';

export type ExportIssueSeverity = 'fatal' | 'warning';

export interface ExportIssue {
  code: ExportIssueCode;
  severity: ExportIssueSeverity;

  /** Question the issue concerns, when there is one */
  questionId?: string;

  /** Archive entry or table row the issue was found in */
  location?: string;

  /** Parser message for well-formedness failures */
  detail?: string;
}

export function hasFatalIssue(issues: ExportIssue[]): boolean {
  return issues.some(issue => issue.severity === 'fatal');
}
