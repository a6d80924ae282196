/**
 * Enrich Stage Services - Barrel Export
 */

export * from './metadata-enricher.service';
export * from './keyword-extractor.service';
export * from './normative-classifier.service';
