/**
 * Question Bank Exchange
 *
 * Validates, merges and packages question collections for import into a
 * learning management system.
 *
 * Main capabilities:
 * - Validate: structural and math-notation checks per question
 * - Merge: combine collections with collision-free ids and an audit report
 * - Package: QTI 1.2 archives or CSV tables, checked after they are built
 *
 * Entry points:
 * - CLI: `qbank export unit1.json unit2.json --format qti`
 * - Programmatic: `exportCollections(sources, 'qti')`
 */

// Models
export * from './models/question.model';
export * from './models/collection.model';
export * from './models/violation.model';
export * from './models/merge-report.model';
export * from './models/package.model';
export * from './models/errors';

// Parsers
export * from './parsers/collection-parser';
export * from './parsers/tabular-parser';

// Transformers
export * from './transformers/notation-transformer';

// Services
export * from './services/question-validator.service';
export * from './services/conflict-resolver.service';
export * from './services/duplicate-detector.service';
export * from './services/merge-engine.service';
export * from './services/package-builder.service';
export * from './services/export-validator.service';
export * from './services/export-pipeline.service';
export * from './services/notation-analysis.service';

// Ambient
export * from './config';
export * from './logging/logger';
export { ConsoleLogger, createLogger } from './logging/console-logger';
