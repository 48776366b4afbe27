import { randomBytes } from 'crypto';
import { FileHandle, mkdir, open, rename, stat, unlink } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';

import { FileNotFoundError, IoError } from '../lib/errors';
import { type ReadFileSystem, type ProgressCallback, type ReadSource, ReadStream } from '../lib/io/read';
import { type FileSystem, type Writer } from '../lib/io/write';
import { logger } from '../lib/utils/logger';

const errorCode = (err: unknown) => {
    return err instanceof Error && 'code' in err ? err.code : undefined;
};

// map fs failures onto the library's error types
const toSbfError = (err: unknown, path: string) => {
    if (errorCode(err) === 'ENOENT') {
        return new FileNotFoundError(path);
    }
    return new IoError(path, err instanceof Error ? err.message : String(err));
};

// ============================================================================
// Read implementations
// ============================================================================

class NodeReadStream extends ReadStream {
    private fileHandle: FileHandle;
    private position: number;
    private end: number;
    private path: string;

    constructor(fileHandle: FileHandle, path: string, start: number, end: number) {
        super(end - start);
        this.fileHandle = fileHandle;
        this.path = path;
        this.position = start;
        this.end = end;
    }

    async pull(target: Uint8Array): Promise<number> {
        const bytesToRead = Math.min(target.length, this.end - this.position);
        if (bytesToRead <= 0) {
            return 0;
        }

        try {
            const { bytesRead } = await this.fileHandle.read(target, 0, bytesToRead, this.position);
            this.position += bytesRead;
            this.bytesRead += bytesRead;
            return bytesRead;
        } catch (err) {
            throw toSbfError(err, this.path);
        }
    }
}

/**
 * ReadSource over a Node.js file handle. Size is exact from stat().
 */
class NodeReadSource implements ReadSource {
    readonly size: number;

    private fileHandle: FileHandle;
    private path: string;
    private closed = false;

    constructor(fileHandle: FileHandle, path: string, size: number) {
        this.fileHandle = fileHandle;
        this.path = path;
        this.size = size;
    }

    read(start: number = 0, end: number = this.size): ReadStream {
        if (this.closed) {
            throw new Error('Source has been closed');
        }

        const clampedStart = Math.max(0, Math.min(start, this.size));
        const clampedEnd = Math.max(clampedStart, Math.min(end, this.size));

        return new NodeReadStream(this.fileHandle, this.path, clampedStart, clampedEnd);
    }

    close(): void {
        if (this.closed) return;
        this.closed = true;
        this.fileHandle.close().catch((err: unknown) => {
            logger.warn(toSbfError(err, this.path).message);
        });
    }
}

/**
 * ReadFileSystem for the local filesystem.
 */
class NodeReadFileSystem implements ReadFileSystem {
    async createSource(filename: string, progress?: ProgressCallback): Promise<ReadSource> {
        try {
            const fileStats = await stat(filename);
            const fileHandle = await open(filename, 'r');

            if (progress) {
                progress(0, fileStats.size);
            }

            return new NodeReadSource(fileHandle, filename, fileStats.size);
        } catch (err) {
            throw toSbfError(err, filename);
        }
    }
}

// ============================================================================
// Write implementations
// ============================================================================

/**
 * Writes to a temporary file and renames it onto the target on close.
 */
class FileWriter implements Writer {
    private fileHandle: FileHandle;
    private filename: string;
    private tmpFilename: string;

    constructor(fileHandle: FileHandle, filename: string, tmpFilename: string) {
        this.fileHandle = fileHandle;
        this.filename = filename;
        this.tmpFilename = tmpFilename;
    }

    async write(data: Uint8Array) {
        try {
            await this.fileHandle.write(data);
        } catch (err) {
            await this.abort();
            throw toSbfError(err, this.filename);
        }
    }

    async close() {
        try {
            // flush to disk
            await this.fileHandle.sync();
            await this.fileHandle.close();
            // atomically rename to target filename
            await rename(this.tmpFilename, this.filename);
        } catch (err) {
            await this.abort();
            throw toSbfError(err, this.filename);
        }
    }

    // release the handle and remove the temporary file
    private async abort() {
        await this.fileHandle.close().catch(() => undefined);
        await unlink(this.tmpFilename).catch(() => undefined);
    }
}

/**
 * FileSystem for writing to the local filesystem.
 */
class NodeFileSystem implements FileSystem {
    async createWriter(filename: string): Promise<Writer> {
        const tmpFilename = `.${basename(filename)}.${process.pid}.${Date.now()}.${randomBytes(6).toString('hex')}.tmp`;
        const tmpPathname = join(dirname(filename), tmpFilename);
        try {
            const fileHandle = await open(tmpPathname, 'wx');
            return new FileWriter(fileHandle, filename, tmpPathname);
        } catch (err) {
            throw toSbfError(err, filename);
        }
    }

    async mkdir(path: string): Promise<void> {
        try {
            await mkdir(path, { recursive: true });
        } catch (err) {
            throw toSbfError(err, path);
        }
    }
}

export { NodeReadFileSystem, NodeFileSystem };
