export { createParser, parse, parseOrThrow } from './core-parser.js';
export { createCursor } from './scanner/cursor.js';
export type { Cursor } from './scanner/cursor.js';

export * from './ast-types.js';
export * from './ast-factory.js';
export * from './ast-traversal.js';
export * from './parser-interfaces.js';
export { ParseError, ParseFailure } from './parse-error.js';
export { computeLineStarts, createPositionMapper } from './position-mapper.js';
export { serialize } from './serializer.js';
