export * from './chunk-document-request.dto';
