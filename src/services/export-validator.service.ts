/**
 * Export Validator
 *
 * Re-reads a built package and checks it against the collection it was built
 * from. Well-formedness problems (unreadable archive, missing or malformed
 * documents, unparseable table) are fatal; everything else is advisory.
 */

import JSZip from 'jszip';

import { Collection } from '../models/collection.model';
import { ExportIssue, ExportIssueCode, TargetFormat } from '../models/package.model';
import { QuestionRecord } from '../models/question.model';
import { parseTable } from '../parsers/tabular-parser';
import { LEADING_COLUMNS } from '../transformers/tabular-transformer';
import { attribute, child, children, findWellFormednessError, parseXml } from '../utils/xml';

import { MANIFEST_FILENAME, QTI_RESOURCE_TYPE } from './manifest.service';

/** Question types that must carry exactly one correct marker */
const SINGLE_ANSWER_TYPES = new Set(['multiple_choice', 'true_false']);

const ARRAY_TAGS = new Set([
  'item',
  'resource',
  'respcondition',
  'varequal',
  'response_label',
  'qtimetadatafield',
  'itemfeedback',
]);

function fatal(code: ExportIssueCode, fields: Omit<ExportIssue, 'code' | 'severity'> = {}): ExportIssue {
  return { code, severity: 'fatal', ...fields };
}

function warning(code: ExportIssueCode, fields: Omit<ExportIssue, 'code' | 'severity'> = {}): ExportIssue {
  return { code, severity: 'warning', ...fields };
}

async function readEntry(zip: JSZip, name: string): Promise<string | undefined> {
  const entry = zip.file(name);
  return entry === null ? undefined : entry.async('string');
}

/**
 * Parse a document, or report it as malformed
 */
function parseDocument(xml: string, location: string, issues: ExportIssue[]): unknown {
  const error = findWellFormednessError(xml);
  if (error !== undefined) {
    issues.push(fatal('MALFORMED_XML', { location, detail: error }));
    return undefined;
  }
  return parseXml(xml, ARRAY_TAGS);
}

/**
 * Identifiers of every organization item below the manifest's organizations,
 * at any depth
 */
function organizationItemIds(node: unknown): string[] {
  const ids: string[] = [];
  for (const item of children(node, 'item')) {
    const id = attribute(item, 'identifier');
    if (id !== undefined) {
      ids.push(id);
    }
    ids.push(...organizationItemIds(item));
  }
  return ids;
}

function assessmentHref(manifest: unknown): string | undefined {
  const resources = child(child(manifest, 'manifest'), 'resources');
  const qti = children(resources, 'resource').find(
    resource => attribute(resource, 'type') === QTI_RESOURCE_TYPE
  );
  return attribute(qti, 'href');
}

/**
 * Count varequal markers in the conditions that award points
 */
function correctMarkerCount(item: unknown): number {
  const conditions = children(child(item, 'resprocessing'), 'respcondition');
  return conditions
    .filter(condition => child(condition, 'setvar') !== undefined)
    .reduce<number>((count, condition) => count + children(child(condition, 'conditionvar'), 'varequal').length, 0);
}

function checkItems(
  assessment: unknown,
  manifestIds: Set<string>,
  expected: Collection<QuestionRecord>,
  location: string
): ExportIssue[] {
  const issues: ExportIssue[] = [];
  const section = child(child(child(assessment, 'questestinterop'), 'assessment'), 'section');

  const items = new Map<string, unknown>();
  for (const item of children(section, 'item')) {
    const ident = attribute(item, 'ident');
    if (ident !== undefined) {
      items.set(ident, item);
    }
  }

  const expectedIds = new Set(expected.questions.map(q => q.id));
  for (const question of expected.questions) {
    const item = items.get(question.id);
    if (item === undefined) {
      issues.push(warning('MISSING_ITEM', { questionId: question.id, location }));
      continue;
    }
    if (!manifestIds.has(question.id)) {
      issues.push(warning('MANIFEST_MISMATCH', { questionId: question.id, location: MANIFEST_FILENAME }));
    }
    if (SINGLE_ANSWER_TYPES.has(question.type)) {
      const markers = correctMarkerCount(item);
      if (markers !== 1) {
        issues.push(
          warning('CORRECT_MARKER_COUNT', {
            questionId: question.id,
            location,
            detail: `${markers} correct markers`,
          })
        );
      }
    }
  }

  for (const ident of items.keys()) {
    if (!expectedIds.has(ident)) {
      issues.push(warning('UNEXPECTED_ITEM', { questionId: ident, location }));
    }
  }
  return issues;
}

async function checkQtiPackage(bytes: Buffer, expected: Collection<QuestionRecord>): Promise<ExportIssue[]> {
  let zip: JSZip;
  try {
    zip = await JSZip.loadAsync(bytes);
  } catch (error) {
    return [fatal('UNREADABLE_ARCHIVE', { detail: error instanceof Error ? error.message : String(error) })];
  }

  const manifestXml = await readEntry(zip, MANIFEST_FILENAME);
  if (manifestXml === undefined) {
    return [fatal('MISSING_DOCUMENT', { location: MANIFEST_FILENAME })];
  }

  const issues: ExportIssue[] = [];
  const manifest = parseDocument(manifestXml, MANIFEST_FILENAME, issues);
  if (manifest === undefined) {
    return issues;
  }

  const href = assessmentHref(manifest);
  const assessmentXml = href === undefined ? undefined : await readEntry(zip, href);
  if (href === undefined || assessmentXml === undefined) {
    issues.push(fatal('MISSING_DOCUMENT', { location: href ?? QTI_RESOURCE_TYPE }));
    return issues;
  }

  const assessment = parseDocument(assessmentXml, href, issues);
  if (assessment === undefined) {
    return issues;
  }

  const organizations = child(child(manifest, 'manifest'), 'organizations');
  const manifestIds = new Set(organizationItemIds(child(organizations, 'organization')));
  issues.push(...checkItems(assessment, manifestIds, expected, href));
  return issues;
}

function checkCsvPackage(bytes: Buffer, expected: Collection<QuestionRecord>): ExportIssue[] {
  const table = parseTable(bytes.toString('utf-8'));
  if (table.errors.length > 0) {
    return table.errors.map(detail => fatal('MALFORMED_TABLE', { detail }));
  }

  const issues: ExportIssue[] = [];
  for (const column of LEADING_COLUMNS) {
    if (!table.columns.includes(column)) {
      issues.push(warning('MISSING_COLUMN', { location: column }));
    }
  }

  if (table.rows.length !== expected.questions.length) {
    issues.push(
      warning('ROW_COUNT_MISMATCH', {
        detail: `${table.rows.length} rows for ${expected.questions.length} questions`,
      })
    );
  }

  table.rows.forEach((row, index) => {
    if ((row.id ?? '').trim() === '') {
      issues.push(warning('MISSING_ROW_ID', { location: `row ${index + 1}` }));
    }
  });
  return issues;
}

/**
 * Check a built package.
 *
 * @returns issues found, empty when the package is sound
 */
export async function checkPackage(
  bytes: Buffer,
  format: TargetFormat,
  expected: Collection<QuestionRecord>
): Promise<ExportIssue[]> {
  if (format === 'csv') {
    return checkCsvPackage(bytes, expected);
  }
  return checkQtiPackage(bytes, expected);
}
