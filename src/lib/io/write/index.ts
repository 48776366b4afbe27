export { type FileSystem, type Writer } from './file-system';

export { writeFile } from './write-helpers';

export { MemoryFileSystem } from './memory-file-system';
