export { formatFromPath, emptyDocumentSentinel } from './format.js';
export { readDocumentContent, decodeText, type ContentReader } from './reader.js';
export { decodeXmlEntities, columnIndex } from './ooxml.js';
