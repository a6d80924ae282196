export * from './enrich.types';
