/**
 * IO module — the only place that touches process streams and the disk.
 */

export { MemoryOutputStream } from './streams.js';
export type { OutputStream } from './streams.js';
export { localFileSystem, InMemoryFileSystem } from './filesystem.js';
export type { FileSystem, InMemoryFileSystemInit } from './filesystem.js';
