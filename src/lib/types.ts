/**
 * Global command-line options.
 */
type Options = {
    /** Overwrite the output file if it exists. */
    overwrite: boolean;

    /** Show help and exit. */
    help: boolean;

    /** Show version and exit. */
    version: boolean;

    /** Suppress non-error output. */
    quiet: boolean;

    /** Show debug output. */
    verbose: boolean;
};

export type { Options };
