/**
 * Package Builder
 *
 * Serializes a merged collection for LMS import:
 * - qti: zip archive with the assessment, its metadata and an IMS manifest
 * - csv: one flat table
 *
 * QTI packages are all-or-nothing. CSV tables keep every row that renders and
 * report the ones that don't.
 */

import JSZip from 'jszip';

import { loadConfig } from '../config';
import { createLogger } from '../logging/console-logger';
import { Logger } from '../logging/logger';
import { Collection } from '../models/collection.model';
import { PackagingError } from '../models/errors';
import { PackageResult, PackagingFailure, TargetFormat } from '../models/package.model';
import { QuestionRecord } from '../models/question.model';
import { TargetDialect } from '../transformers/notation-transformer';
import { toAssessmentDocument, toAssessmentItem } from '../transformers/qti-item-transformer';
import { toTabular } from '../transformers/tabular-transformer';
import { packageNameFor } from '../utils/filename';
import { XmlElement, buildXml } from '../utils/xml';

import {
  MANIFEST_FILENAME,
  buildAssessmentMeta,
  buildManifest,
  packageLayout,
} from './manifest.service';

export interface PackageOptions {
  /** Math dialect of the target renderer (default from config) */
  dialect?: TargetDialect;

  /** Assessment title; falls back to the collection subject, then config */
  title?: string;

  /** Clock for created dates in the archive */
  now?: () => Date;

  /** Fewest choice columns in CSV output (default from config) */
  minChoiceColumns?: number;

  logger?: Logger;
}

/** Fixed timestamp for archive entries so equal input gives equal bytes */
const ENTRY_DATE = new Date(Date.UTC(2000, 0, 1));

export const CSV_FILENAME = 'questions.csv';

/**
 * Title used for the assessment and its package name
 */
export function resolveTitle(collection: Collection<QuestionRecord>, title: string | undefined, fallback: string): string {
  const candidates = [title, collection.metadata.subject, fallback];
  for (const candidate of candidates) {
    if (candidate !== undefined && candidate.trim() !== '') {
      return candidate.trim();
    }
  }
  return fallback;
}

async function buildQtiPackage(
  collection: Collection<QuestionRecord>,
  options: Required<Omit<PackageOptions, 'minChoiceColumns'>>
): Promise<PackageResult> {
  const items: XmlElement[] = [];
  const failures: PackagingFailure[] = [];

  for (const question of collection.questions) {
    try {
      items.push(toAssessmentItem(question, options.dialect));
    } catch (error) {
      if (!(error instanceof PackagingError)) {
        throw error;
      }
      failures.push(...error.failures);
    }
  }

  if (failures.length > 0) {
    options.logger.error(`QTI build failed for ${failures.length} questions`, undefined, {
      questionIds: failures.map(f => f.questionId),
    });
    throw new PackagingError(
      `Cannot build QTI package: ${failures.map(f => `${f.questionId} (${f.reason})`).join(', ')}`,
      failures
    );
  }

  const layout = packageLayout(packageNameFor(options.title));
  const questionIds = collection.questions.map(q => q.id);

  const zip = new JSZip();
  const entries: Array<[string, string]> = [
    [MANIFEST_FILENAME, buildManifest(layout, questionIds, options.title)],
    [
      layout.assessmentPath,
      buildXml(toAssessmentDocument(items, { ident: layout.name, title: options.title })),
    ],
    [
      layout.metaPath,
      buildAssessmentMeta(layout, {
        title: options.title,
        questionCount: items.length,
        pointsPossible: collection.questions.reduce((sum, q) => sum + q.points, 0),
        createdDate: options.now().toISOString(),
      }),
    ],
  ];
  for (const [name, content] of entries) {
    zip.file(name, content, { date: ENTRY_DATE, createFolders: false });
  }

  const bytes = await zip.generateAsync({ type: 'nodebuffer', compression: 'DEFLATE' });
  options.logger.info(`Built QTI package '${layout.name}'`, {
    items: items.length,
    bytes: bytes.length,
  });

  return {
    format: 'qti',
    bytes,
    itemCount: items.length,
    failures: [],
    files: entries.map(([name]) => name),
  };
}

function buildCsvPackage(
  collection: Collection<QuestionRecord>,
  dialect: TargetDialect,
  minChoiceColumns: number,
  logger: Logger
): PackageResult {
  const table = toTabular(collection.questions, { dialect, minChoiceColumns });
  if (table.failures.length > 0) {
    logger.warn(`Left ${table.failures.length} questions out of the CSV table`, {
      questionIds: table.failures.map(f => f.questionId),
    });
  }
  logger.info(`Built CSV table`, { rows: table.rowCount, columns: table.columns.length });

  return {
    format: 'csv',
    bytes: Buffer.from(table.csv, 'utf-8'),
    itemCount: table.rowCount,
    failures: table.failures,
    files: [CSV_FILENAME],
  };
}

/**
 * Build an importable package.
 *
 * @throws PackagingError (qti) naming every question that cannot be rendered
 */
export async function buildPackage(
  collection: Collection<QuestionRecord>,
  format: TargetFormat,
  options: PackageOptions = {}
): Promise<PackageResult> {
  const config = loadConfig();
  const logger = options.logger ?? createLogger('package');
  const dialect = options.dialect ?? config.targetDialect;

  if (format === 'csv') {
    return buildCsvPackage(
      collection,
      dialect,
      options.minChoiceColumns ?? config.minChoiceColumns,
      logger
    );
  }

  return buildQtiPackage(collection, {
    dialect,
    title: resolveTitle(collection, options.title, config.defaultTitle),
    now: options.now ?? (() => new Date()),
    logger,
  });
}
