/**
 * Pull-based byte stream. The consumer supplies the buffer to fill.
 * @ignore
 */
abstract class ReadStream {
    /** Size hint used to pre-allocate in readAll(), if known. */
    readonly expectedSize: number | undefined;

    /** Total bytes read from this stream so far. */
    bytesRead: number = 0;

    constructor(expectedSize?: number) {
        this.expectedSize = expectedSize;
    }

    /**
     * Pull data into the provided buffer.
     * @param target - Buffer to fill with data
     * @returns Number of bytes read, or 0 at end of stream
     */
    abstract pull(target: Uint8Array): Promise<number>;

    /**
     * Read the rest of the stream into a single buffer.
     * @returns The data read
     */
    async readAll(): Promise<Uint8Array> {
        let buffer = new Uint8Array(Math.max(1, this.expectedSize ?? 65536));
        let length = 0;

        while (true) {
            if (length >= buffer.length) {
                const grown = new Uint8Array(buffer.length * 2);
                grown.set(buffer);
                buffer = grown;
            }

            const n = await this.pull(buffer.subarray(length));
            if (n === 0) break;
            length += n;
        }

        return buffer.subarray(0, length);
    }

    close(): void {
        // nothing to release by default
    }
}

/**
 * A readable resource of known or unknown size.
 * @ignore
 */
interface ReadSource {
    /** Size in bytes, or undefined if unknown. */
    readonly size: number | undefined;

    /**
     * Create a stream over a byte range.
     * @param start - First byte (inclusive), defaults to 0
     * @param end - Last byte (exclusive), defaults to the end of the source
     */
    read(start?: number, end?: number): ReadStream;

    close(): void;
}

/**
 * Progress callback for read operations.
 * @param bytesLoaded - Bytes loaded so far
 * @param totalBytes - Total bytes if known
 */
type ProgressCallback = (bytesLoaded: number, totalBytes: number | undefined) => void;

/**
 * A file system that can open readable sources.
 *
 * Implementations reject with `FileNotFoundError` when the file does not exist
 * and with `IoError` for any other failure.
 */
interface ReadFileSystem {
    createSource(filename: string, progress?: ProgressCallback): Promise<ReadSource>;
}

/**
 * Read an entire file into memory.
 * @param fs - The file system to read from
 * @param filename - Path of the file
 * @returns The file contents
 */
const readFile = async (fs: ReadFileSystem, filename: string): Promise<Uint8Array> => {
    const source = await fs.createSource(filename);
    try {
        return await source.read().readAll();
    } finally {
        source.close();
    }
};

export { ReadStream, type ReadSource, type ReadFileSystem, type ProgressCallback, readFile };
