export * from './enrich-input.dto';
export * from './enrich-output.dto';
