// defines the interface for a stream writer class
interface Writer {
    // write data to the stream
    write(data: Uint8Array): void | Promise<void>;

    // close the stream, committing the file
    close(): void | Promise<void>;
}

interface FileSystem {
    // create a writer for the given filename
    createWriter(filename: string): Writer | Promise<Writer>;

    // create a directory (and its parents) at the given path
    mkdir(path: string): Promise<void>;
}

export { type FileSystem, type Writer };
