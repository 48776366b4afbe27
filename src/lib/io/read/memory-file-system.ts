import { FileNotFoundError } from '../../errors';
import { type ReadFileSystem, type ProgressCallback, type ReadSource, ReadStream } from './file-system';

class MemoryReadStream extends ReadStream {
    private data: Uint8Array;
    private offset: number;
    private end: number;

    constructor(data: Uint8Array, start: number, end: number) {
        super(end - start);
        this.data = data;
        this.offset = start;
        this.end = end;
    }

    pull(target: Uint8Array): Promise<number> {
        const count = Math.min(target.length, this.end - this.offset);
        if (count <= 0) {
            return Promise.resolve(0);
        }

        target.set(this.data.subarray(this.offset, this.offset + count));
        this.offset += count;
        this.bytesRead += count;
        return Promise.resolve(count);
    }
}

class MemoryReadSource implements ReadSource {
    readonly size: number;

    private data: Uint8Array;
    private closed = false;

    constructor(data: Uint8Array) {
        this.data = data;
        this.size = data.length;
    }

    read(start: number = 0, end: number = this.size): ReadStream {
        if (this.closed) {
            throw new Error('Source has been closed');
        }

        const clampedStart = Math.max(0, Math.min(start, this.size));
        const clampedEnd = Math.max(clampedStart, Math.min(end, this.size));

        return new MemoryReadStream(this.data, clampedStart, clampedEnd);
    }

    close(): void {
        this.closed = true;
    }
}

/**
 * ReadFileSystem over named in-memory buffers.
 *
 * @example
 * ```ts
 * const fs = new MemoryReadFileSystem();
 * fs.set('cloud.sbf', headerBytes);
 * fs.set('cloud.sbf.data', payloadBytes);
 * const doc = await readSbf(fs, 'cloud.sbf');
 * ```
 */
class MemoryReadFileSystem implements ReadFileSystem {
    private buffers: Map<string, Uint8Array> = new Map();

    /**
     * Store a named buffer. Strings are stored as UTF-8.
     * @param name - Path of the buffer
     * @param data - Contents
     */
    set(name: string, data: Uint8Array | string): void {
        this.buffers.set(name, typeof data === 'string' ? new TextEncoder().encode(data) : data);
    }

    get(name: string): Uint8Array | undefined {
        return this.buffers.get(name);
    }

    createSource(filename: string, progress?: ProgressCallback): Promise<ReadSource> {
        const data = this.buffers.get(filename);
        if (!data) {
            return Promise.reject(new FileNotFoundError(filename));
        }

        // already in memory, so loading is complete
        if (progress) {
            progress(data.length, data.length);
        }

        return Promise.resolve(new MemoryReadSource(data));
    }
}

export { MemoryReadFileSystem };
