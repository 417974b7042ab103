export { printTable } from './table';
export { OutputRenderer } from './renderer';
export type { DocumentListing, DocumentState, StatusReport } from './renderer';
