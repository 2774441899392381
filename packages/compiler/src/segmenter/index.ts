export { segmentDocument, parseOptions } from './segment-document.js';
export * from './types.js';
