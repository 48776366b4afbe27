import { type FileSystem, type Writer } from './file-system';

// collect written chunks and hand them over, joined, on close
class MemoryWriter implements Writer {
    private chunks: Uint8Array[] = [];
    private onclose: (data: Uint8Array) => void;

    constructor(onclose: (data: Uint8Array) => void) {
        this.onclose = onclose;
    }

    write(data: Uint8Array) {
        // callers may reuse their buffer after write() returns
        this.chunks.push(data.slice());
    }

    close() {
        const size = this.chunks.reduce((total, chunk) => total + chunk.byteLength, 0);
        const result = new Uint8Array(size);
        let offset = 0;
        for (const chunk of this.chunks) {
            result.set(chunk, offset);
            offset += chunk.byteLength;
        }
        this.chunks = [];
        this.onclose(result);
    }
}

/**
 * A file system that writes files to in-memory buffers. A file only appears in
 * `results` once its writer is closed.
 *
 * @example
 * ```ts
 * const fs = new MemoryFileSystem();
 * await writeSbf({ filename: 'out/cloud.sbf', document }, fs);
 *
 * const header = fs.text('out/cloud.sbf');
 * const payload = fs.results.get('out/cloud.sbf.data');
 * ```
 */
class MemoryFileSystem implements FileSystem {
    results: Map<string, Uint8Array> = new Map();

    directories: Set<string> = new Set();

    createWriter(filename: string): Writer {
        return new MemoryWriter((data) => {
            this.results.set(filename, data);
        });
    }

    mkdir(path: string): Promise<void> {
        this.directories.add(path);
        return Promise.resolve();
    }

    /**
     * @returns The UTF-8 contents of a written file, or undefined if absent.
     */
    text(filename: string): string | undefined {
        const data = this.results.get(filename);
        return data && new TextDecoder().decode(data);
    }
}

export { MemoryFileSystem };
