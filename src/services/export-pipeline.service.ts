/**
 * Export Pipeline Service
 *
 * Orchestrates a full export:
 * 1. Merge the source collections (stops on validation violations)
 * 2. Build the package in the requested format
 * 3. Re-read the package and check it against the merged collection
 */

import { createLogger } from '../logging/console-logger';
import { Logger } from '../logging/logger';
import { Collection } from '../models/collection.model';
import { ExportIntegrityError } from '../models/errors';
import { MergeReport } from '../models/merge-report.model';
import { ExportIssue, PackageResult, TargetFormat, hasFatalIssue } from '../models/package.model';
import { Question, QuestionRecord } from '../models/question.model';
import { SourcedViolation } from '../models/violation.model';

import { checkPackage } from './export-validator.service';
import { MergeOptions, mergeCollections } from './merge-engine.service';
import { PackageOptions, buildPackage } from './package-builder.service';

export interface ExportOptions
  extends Omit<MergeOptions, 'logger'>,
    Omit<PackageOptions, 'logger' | 'now'> {
  logger?: Logger;
}

export type ExportOutcome =
  | {
      ok: true;
      collection: Collection<Question>;
      report: MergeReport;
      package: PackageResult;

      /** Advisory findings of the post-build check */
      issues: ExportIssue[];
    }
  | { ok: false; violations: SourcedViolation[] };

/**
 * Merge, package and check.
 *
 * @throws PackagingError when the package cannot be built
 * @throws ExportIntegrityError when the built package is not well-formed
 */
export async function exportCollections(
  sources: Collection<QuestionRecord>[],
  format: TargetFormat,
  options: ExportOptions = {}
): Promise<ExportOutcome> {
  const logger = options.logger ?? createLogger('export');

  const merged = mergeCollections(sources, {
    detectDuplicates: options.detectDuplicates,
    similarityThreshold: options.similarityThreshold,
    now: options.now,
    logger,
  });
  if (!merged.ok) {
    return merged;
  }

  const built = await buildPackage(merged.collection, format, {
    dialect: options.dialect,
    title: options.title,
    minChoiceColumns: options.minChoiceColumns,
    now: options.now,
    logger,
  });

  const issues = await checkPackage(built.bytes, format, merged.collection);
  if (hasFatalIssue(issues)) {
    logger.error('Built package failed its integrity check', undefined, {
      issues: issues.map(issue => issue.code),
    });
    throw new ExportIntegrityError(
      `Package failed integrity check: ${issues.map(issue => issue.code).join(', ')}`,
      issues
    );
  }
  if (issues.length > 0) {
    logger.warn(`Package has ${issues.length} advisory issues`);
  }

  return {
    ok: true,
    collection: merged.collection,
    report: merged.report,
    package: built,
    issues,
  };
}
