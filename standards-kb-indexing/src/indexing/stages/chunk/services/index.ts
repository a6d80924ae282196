export * from './token-counter.service';
export * from './hierarchical-chunker.service';
export * from './section-stack';
export * from './clause-number';
export * from './table-renderer';
