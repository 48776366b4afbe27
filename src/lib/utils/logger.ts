/**
 * Progress node representing a step in a nested progress tree.
 * Walk up via `parent` to access enclosing steps.
 */
interface ProgressNode {
    /** Current step number at this level. */
    step: number;
    /** Total number of steps at this level. */
    totalSteps: number;
    /** Name of the current step (undefined for anonymous steps). */
    stepName?: string;
    /** Parent node (undefined for root level). */
    parent?: ProgressNode;
}

/**
 * Logger interface for injectable logging implementation.
 */
interface Logger {
    log(...args: unknown[]): void;
    warn(...args: unknown[]): void;
    error(...args: unknown[]): void;
    debug(...args: unknown[]): void;
    /** Output data to stdout (for piping). */
    output(text: string): void;
    /** Called on progress step updates with the current node. */
    onProgress(node: ProgressNode): void;
}

/**
 * - `silent` - errors and output only
 * - `normal` - adds log, warn and progress
 * - `verbose` - adds debug
 */
type LogLevel = 'silent' | 'normal' | 'verbose';

const depthOf = (node: ProgressNode) => {
    let depth = 0;
    for (let n = node.parent; n; n = n.parent) depth++;
    return depth;
};

/**
 * Default logger implementation, console based.
 */
const defaultLogger: Logger = {
    log: (...args) => console.log(...args),
    warn: (...args) => console.warn(...args),
    error: (...args) => console.error(...args),
    debug: (...args) => console.log(...args),
    output: text => console.log(text),
    onProgress: (node) => {
        // step 0 is the begin notification - nothing to print
        if (node.step === 0) return;

        const indent = '  '.repeat(depthOf(node));
        console.log(`${indent}[${node.step}/${node.totalSteps}] ${node.stepName ?? ''}`);
    }
};

let impl: Logger = defaultLogger;
let level: LogLevel = 'normal';

/**
 * Nested progress tracking. begin(n) opens a level, step() advances it and the
 * level closes itself after the n-th step.
 */
class Progress {
    private currentNode: ProgressNode | undefined;

    begin(totalSteps: number) {
        this.currentNode = {
            step: 0,
            totalSteps,
            stepName: undefined,
            parent: this.currentNode
        };

        if (level !== 'silent') impl.onProgress(this.currentNode);

        // nothing to step through
        if (totalSteps === 0) {
            this.currentNode = this.currentNode.parent;
        }
    }

    step(name?: string) {
        if (!this.currentNode) return;

        this.currentNode.step++;
        this.currentNode.stepName = name;

        if (level !== 'silent') impl.onProgress(this.currentNode);

        if (this.currentNode.step === this.currentNode.totalSteps) {
            this.currentNode = this.currentNode.parent;
        }
    }
}

/**
 * Global logger instance with injectable implementation.
 * Use setLogger() to provide a custom implementation (e.g. Node.js with
 * process.stdout) and setLevel() / setQuiet() to filter output.
 */
const logger = {
    progress: new Progress(),

    setLogger(l: Logger) {
        impl = l;
    },

    setLevel(l: LogLevel) {
        level = l;
    },

    /**
     * Shorthand for setLevel('silent') / setLevel('normal').
     */
    setQuiet(q: boolean) {
        level = q ? 'silent' : 'normal';
    },

    log(...args: unknown[]) {
        if (level !== 'silent') impl.log(...args);
    },

    warn(...args: unknown[]) {
        if (level !== 'silent') impl.warn(...args);
    },

    /**
     * Always shown, even when silent.
     */
    error(...args: unknown[]) {
        impl.error(...args);
    },

    debug(...args: unknown[]) {
        if (level === 'verbose') impl.debug(...args);
    },

    /**
     * Always shown, even when silent.
     */
    output(text: string) {
        impl.output(text);
    }
};

export { logger, defaultLogger };
export type { Logger, LogLevel, ProgressNode };
