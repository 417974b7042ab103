export { computeChecksum } from './checksum';
export { normalizeText } from './normalize';
export {
  listDocuments,
  readDocument,
  isSupportedDocument,
  type ReadDocumentOptions,
} from './reader';
