export { ReadStream, type ReadSource, type ReadFileSystem, type ProgressCallback, readFile } from './file-system';

export { MemoryReadFileSystem } from './memory-file-system';
