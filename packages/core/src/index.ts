export const name = '@docvault/core';

export { chunkText, assertChunkParameters, type TextChunk, type ChunkTextOptions } from './chunking/chunker';
export * from './sources';
export * from './ingestion';
export * from './retrieval';
export { ConfigLoader, type ConfigOptions } from './config/loader';
