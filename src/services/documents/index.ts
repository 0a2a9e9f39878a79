export { readDocx, readUploadedDocument, decodeXmlEntities, topLevelElements } from './docx.reader';
export { EMPTY_DOCUMENT, type DocumentSource } from './document.types';
