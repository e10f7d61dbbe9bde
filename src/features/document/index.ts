// Document feature: parse tree validation and whole-document compilation

export { documentSchema, parseDocumentTree } from './schemas/parse-tree-schema';
export { compileDocument, compileDocumentTree } from './utils/document-compiler';
export type { DocumentCompileResult } from './utils/document-compiler';
