export * from './search-request.dto';
export * from './assess-coverage-request.dto';
export * from './build-lexical-index-request.dto';
