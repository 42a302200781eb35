#!/usr/bin/env node
/**
 * Question Bank CLI
 *
 * Command-line interface for validating, merging and exporting question
 * collections.
 *
 * Usage:
 *   qbank validate unit1.json unit2.json
 *   qbank merge unit1.json unit2.json --output merged.json
 *   qbank export unit1.json unit2.json --format qti --title "Midterm"
 *   qbank check midterm.zip --format qti --against merged.json
 *   qbank analyze unit1.json
 *
 * Environment: QBANK_LOG_LEVEL, QBANK_TARGET_DIALECT,
 * QBANK_DUPLICATE_THRESHOLD, QBANK_MIN_CHOICE_COLUMNS, QBANK_DEFAULT_TITLE
 */

import * as fs from 'fs';
import * as path from 'path';

import { Command } from 'commander';

import { loadConfig } from '../config';
import { RawCollection } from '../models/collection.model';
import { MergeOutcome } from '../models/merge-report.model';
import { ExportIntegrityError, PackagingError, StructuralError } from '../models/errors';
import { ExportIssue, hasFatalIssue, isTargetFormat, TargetFormat } from '../models/package.model';
import { SourcedViolation } from '../models/violation.model';
import { readCollectionFile } from '../parsers/collection-parser';
import { checkPackage } from '../services/export-validator.service';
import { ExportOutcome, exportCollections } from '../services/export-pipeline.service';
import { mergeCollections } from '../services/merge-engine.service';
import { analyzeNotation } from '../services/notation-analysis.service';
import { validateCollection } from '../services/question-validator.service';
import { isTargetDialect, TargetDialect } from '../transformers/notation-transformer';

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

function describeError(err: unknown): string {
  if (err instanceof StructuralError) {
    return [err.message, ...err.issues.map(issue => `  - ${issue}`)].join('\n');
  }
  if (err instanceof PackagingError) {
    const lines = err.failures.map(f =>
      f.field ? `  - ${f.questionId}: ${f.reason} (${f.field})` : `  - ${f.questionId}: ${f.reason}`
    );
    return [err.message, ...lines].join('\n');
  }
  return err instanceof Error ? err.message : String(err);
}

function formatViolation(sourced: SourcedViolation, files: string[]): string {
  const { violation } = sourced;
  const where = [violation.field, violation.position === undefined ? undefined : `@${violation.position}`]
    .filter(part => part !== undefined)
    .join(' ');
  const source = files[sourced.sourceIndex] ?? `source ${sourced.sourceIndex}`;
  return `  - ${source} #${sourced.position + 1} ${sourced.questionId}: ${violation.kind}${where ? ` (${where})` : ''}`;
}

function formatIssue(issue: ExportIssue): string {
  const parts = [issue.questionId, issue.location, issue.detail].filter(part => part !== undefined);
  return `  - [${issue.severity}] ${issue.code}${parts.length > 0 ? `: ${parts.join(', ')}` : ''}`;
}

function printViolations(violations: SourcedViolation[], files: string[]): void {
  console.error(`✗ ${violations.length} violations:`);
  for (const violation of violations) {
    console.error(formatViolation(violation, files));
  }
}

function parseFormat(value: string): TargetFormat {
  return isTargetFormat(value) ? value : fail(`Unknown format '${value}' (expected qti or csv)`);
}

function parseDialect(value: string | undefined): TargetDialect | undefined {
  if (value === undefined) {
    return undefined;
  }
  return isTargetDialect(value) ? value : fail(`Unknown dialect '${value}' (expected canvas or bracketed)`);
}

function readCollections(files: string[]): RawCollection[] {
  return files.map(file => readCollectionFile(path.resolve(file)));
}

export function createProgram(): Command {
  const config = loadConfig();
  const program = new Command();

  program
    .name('qbank')
    .description('Validate, merge and export question collections for LMS import')
    .version('1.0.0')
    .hook('preAction', () => {
      for (const name of config.rejected) {
        console.error(`Ignoring invalid ${name}; using the default`);
      }
    });

  program
    .command('validate')
    .description('Check collections for structural and notation problems')
    .argument('<files...>', 'Collection JSON files')
    .action((files: string[]) => {
      let violations: SourcedViolation[];
      try {
        violations = readCollections(files).flatMap((collection, index) =>
          validateCollection(collection, index)
        );
      } catch (err) {
        fail(`✗ Validation failed: ${describeError(err)}`);
      }

      if (violations.length > 0) {
        printViolations(violations, files);
        process.exit(1);
      }
      console.log(`✓ ${files.length} collections are valid`);
    });

  program
    .command('merge')
    .description('Merge collections into one with unique question ids')
    .argument('<files...>', 'Collection JSON files, in merge order')
    .option('-o, --output <file>', 'Merged collection file', 'merged.json')
    .option('--no-duplicates', 'Skip near-duplicate detection')
    .action((files: string[], options: { output: string; duplicates: boolean }) => {
      let outcome: MergeOutcome;
      try {
        outcome = mergeCollections(readCollections(files), {
          detectDuplicates: options.duplicates,
          similarityThreshold: config.duplicateThreshold,
        });
      } catch (err) {
        fail(`✗ Merge failed: ${describeError(err)}`);
      }
      if (!outcome.ok) {
        printViolations(outcome.violations, files);
        process.exit(1);
      }

      const outputPath = path.resolve(options.output);
      fs.writeFileSync(outputPath, JSON.stringify(outcome.collection, null, 2), 'utf-8');

      const { report } = outcome;
      console.log(`✓ Merged ${report.questionsIn} questions into ${outputPath}`);
      console.log(`  Collisions renamed: ${report.collisionCount}`);
      for (const conflict of report.conflicts) {
        console.log(`  - ${files[conflict.sourceIndex]}: ${conflict.originalId} → ${conflict.finalId}`);
      }
      if (report.duplicates.length > 0) {
        console.log(`  Possible duplicates: ${report.duplicates.length}`);
        for (const duplicate of report.duplicates) {
          console.log(
            `  - ${duplicate.first.id} ~ ${duplicate.second.id} (${Math.round(duplicate.similarity * 100)}%)`
          );
        }
      }
    });

  program
    .command('export')
    .description('Merge collections and build an LMS package')
    .argument('<files...>', 'Collection JSON files, in merge order')
    .option('-f, --format <format>', 'Package format: qti or csv', 'qti')
    .option('-o, --output <file>', 'Package file (default export.zip or export.csv)')
    .option('-t, --title <title>', 'Assessment title')
    .option('--dialect <dialect>', 'Math dialect: canvas or bracketed')
    .action(
      async (
        files: string[],
        options: { format: string; output?: string; title?: string; dialect?: string }
      ) => {
        const format = parseFormat(options.format);
        const dialect = parseDialect(options.dialect);

        let outcome: ExportOutcome;
        try {
          outcome = await exportCollections(readCollections(files), format, {
            dialect,
            title: options.title,
            similarityThreshold: config.duplicateThreshold,
          });
        } catch (err) {
          if (err instanceof ExportIntegrityError) {
            fail([`✗ ${err.message}`, ...err.issues.map(formatIssue)].join('\n'));
          }
          fail(`✗ Export failed: ${describeError(err)}`);
        }
        if (!outcome.ok) {
          printViolations(outcome.violations, files);
          process.exit(1);
        }

        const outputPath = path.resolve(options.output ?? `export.${format === 'qti' ? 'zip' : 'csv'}`);
        fs.writeFileSync(outputPath, outcome.package.bytes);

        console.log(`✓ Wrote ${outcome.package.itemCount} questions to ${outputPath}`);
        for (const issue of outcome.issues) {
          console.log(formatIssue(issue));
        }
        if (outcome.package.failures.length > 0) {
          console.error(`✗ ${outcome.package.failures.length} questions left out:`);
          for (const failure of outcome.package.failures) {
            console.error(`  - ${failure.questionId}: ${failure.reason}`);
          }
          process.exit(1);
        }
      }
    );

  program
    .command('check')
    .description('Check a built package against the collection it was built from')
    .argument('<package>', 'Package file')
    .requiredOption('-a, --against <file>', 'Collection JSON the package was built from')
    .option('-f, --format <format>', 'Package format: qti or csv', 'qti')
    .action(async (packageFile: string, options: { against: string; format: string }) => {
      const format = parseFormat(options.format);

      let issues: ExportIssue[];
      try {
        const expected = readCollectionFile(path.resolve(options.against));
        issues = await checkPackage(fs.readFileSync(path.resolve(packageFile)), format, expected);
      } catch (err) {
        fail(`✗ Check failed: ${describeError(err)}`);
      }

      if (issues.length === 0) {
        console.log('✓ Package is sound');
        return;
      }
      for (const issue of issues) {
        console.log(formatIssue(issue));
      }
      if (hasFatalIssue(issues)) {
        fail('✗ Package is not well-formed');
      }
      console.log(`${issues.length} advisory issues`);
    });

  program
    .command('analyze')
    .description('Report how much math notation collections contain')
    .argument('<files...>', 'Collection JSON files')
    .action((files: string[]) => {
      try {
        const questions = readCollections(files).flatMap(collection => collection.questions);
        const analysis = analyzeNotation(questions);

        console.log('Notation Analysis');
        console.log('=================');
        console.log(`Questions: ${analysis.totalQuestions}`);
        console.log(
          `With math: ${analysis.questionsWithMath} (${analysis.mathPercentage.toFixed(1)}%)`
        );
        console.log(
          `Spans: ${analysis.spans.total} (${analysis.spans.inline} inline, ${analysis.spans.block} block)`
        );
        console.log(
          `Fields with math: text ${analysis.fieldsWithMath.text}, choices ${analysis.fieldsWithMath.choices}, feedback ${analysis.fieldsWithMath.feedback}`
        );
        console.log(
          `Complexity: none ${analysis.questionsByComplexity.none}, simple ${analysis.questionsByComplexity.simple}, complex ${analysis.questionsByComplexity.complex}`
        );
        if (analysis.samples.length > 0) {
          console.log('Samples:');
          for (const sample of analysis.samples) {
            console.log(`  ${sample}`);
          }
        }
      } catch (err) {
        fail(`✗ Analysis failed: ${describeError(err)}`);
      }
    });

  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch(err => {
      console.error(describeError(err));
      process.exit(1);
    });
}
