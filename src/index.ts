import { lstat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { hrtime } from 'node:process';
import { parseArgs } from 'node:util';

import { Vec3 } from 'playcanvas';

import { version } from '../package.json';
import { NodeFileSystem, NodeReadFileSystem } from './cli/node-file-system';
import { combine } from './lib/combine';
import { SbfError } from './lib/errors';
import { type ProcessAction, processDocument } from './lib/process';
import { getInputFormat, readFile } from './lib/read';
import { type Options } from './lib/types';
import { type Logger, logger } from './lib/utils/logger';
import { getOutputFormat, writeFile } from './lib/write';

type File = {
    filename: string;
    processActions: ProcessAction[];
};

const fileExists = async (filename: string) => {
    try {
        await lstat(filename);
        return true;
    } catch (e: unknown) {
        if (e instanceof Error && 'code' in e && e.code === 'ENOENT') {
            return false;
        }
        throw e; // real error (permissions, etc)
    }
};

const parseNumber = (value: string): number => {
    const result = Number(value);
    if (value.trim() === '' || isNaN(result)) {
        throw new Error(`Invalid number value: ${value}`);
    }
    return result;
};

const parseVec3 = (value: string): Vec3 => {
    const parts = value.split(',').map(p => parseNumber(p.trim()));
    if (parts.length !== 3) {
        throw new Error(`Invalid Vec3 value: ${value}`);
    }
    return new Vec3(parts[0], parts[1], parts[2]);
};

const parseComparator = (value: string): 'lt' | 'lte' | 'gt' | 'gte' | 'eq' | 'neq' => {
    switch (value) {
        case 'lt': return 'lt';
        case 'lte': return 'lte';
        case 'gt': return 'gt';
        case 'gte': return 'gte';
        case 'eq': return 'eq';
        case 'neq': return 'neq';
        default:
            throw new Error(`Invalid comparator value: ${value}`);
    }
};

const parseArguments = (args: string[]) => {
    const { values: v, tokens } = parseArgs({
        args,
        tokens: true,
        strict: true,
        allowPositionals: true,
        options: {
            // global options
            overwrite: { type: 'boolean', short: 'w', default: false },
            help: { type: 'boolean', short: 'h', default: false },
            version: { type: 'boolean', short: 'v', default: false },
            quiet: { type: 'boolean', short: 'q', default: false },
            verbose: { type: 'boolean', default: false },

            // per-file options
            translate: { type: 'string', short: 't', multiple: true },
            'filter-nan': { type: 'boolean', short: 'N', multiple: true },
            'filter-value': { type: 'string', short: 'V', multiple: true },
            'filter-box': { type: 'string', short: 'B', multiple: true },
            'add-index': { type: 'boolean', short: 'a', multiple: true },
            'remove-field': { type: 'string', short: 'd', multiple: true },
            'remove-all-fields': { type: 'boolean', short: 'D', multiple: true },
            'rename-field': { type: 'string', short: 'n', multiple: true },
            'global-shift': { type: 'string', short: 'g', multiple: true },
            'drop-global-shift': { type: 'boolean', short: 'G', multiple: true }
        }
    });

    const files: File[] = [];

    const options: Options = {
        overwrite: v.overwrite ?? false,
        help: v.help ?? false,
        version: v.version ?? false,
        quiet: v.quiet ?? false,
        verbose: v.verbose ?? false
    };

    for (const t of tokens) {
        if (t.kind === 'positional') {
            files.push({
                filename: t.value,
                processActions: []
            });
        } else if (t.kind === 'option' && files.length > 0) {
            const current = files[files.length - 1];
            const value = t.value ?? '';
            switch (t.name) {
                case 'translate':
                    current.processActions.push({
                        kind: 'translate',
                        value: parseVec3(value)
                    });
                    break;
                case 'filter-nan':
                    current.processActions.push({
                        kind: 'filterNaN'
                    });
                    break;
                case 'filter-value': {
                    const parts = value.split(',').map(p => p.trim());
                    if (parts.length !== 3) {
                        throw new Error(`Invalid filter-value value: ${value}`);
                    }
                    current.processActions.push({
                        kind: 'filterByValue',
                        columnName: parts[0],
                        comparator: parseComparator(parts[1]),
                        value: parseNumber(parts[2])
                    });
                    break;
                }
                case 'filter-box': {
                    const parts = value.split(',').map(p => p.trim());
                    if (parts.length !== 6) {
                        throw new Error(`Invalid filter-box value: ${value}`);
                    }

                    // empty or '-' leaves that side of the box open
                    const defaults = [-Infinity, -Infinity, -Infinity, Infinity, Infinity, Infinity];
                    const values = parts.map((p, i) => (p === '' || p === '-' ? defaults[i] : parseNumber(p)));

                    current.processActions.push({
                        kind: 'filterBox',
                        min: new Vec3(values[0], values[1], values[2]),
                        max: new Vec3(values[3], values[4], values[5])
                    });
                    break;
                }
                case 'add-index':
                    current.processActions.push({
                        kind: 'addIndex'
                    });
                    break;
                case 'remove-field':
                    current.processActions.push({
                        kind: 'removeField',
                        name: value
                    });
                    break;
                case 'remove-all-fields':
                    current.processActions.push({
                        kind: 'removeAllFields'
                    });
                    break;
                case 'rename-field': {
                    const eq = value.indexOf('=');
                    if (eq === -1) {
                        throw new Error(`Invalid rename-field value: ${value}. Expected old=new.`);
                    }
                    current.processActions.push({
                        kind: 'renameField',
                        name: value.slice(0, eq),
                        newName: value.slice(eq + 1)
                    });
                    break;
                }
                case 'global-shift':
                    current.processActions.push({
                        kind: 'setGlobalShift',
                        value: parseVec3(value)
                    });
                    break;
                case 'drop-global-shift':
                    current.processActions.push({
                        kind: 'dropGlobalShift'
                    });
                    break;
            }
        }
    }

    return { files, options };
};

const usage = `
Transform & inspect SBF point clouds
====================================

USAGE
  sbf-transform [GLOBAL] input [ACTIONS]  ...  output [ACTIONS]

  • Input files become the working set; ACTIONS are applied in order.
  • Several inputs are merged into one cloud; fields missing from an input are NaN.
  • The last file is the output; actions after it modify the final result.

SUPPORTED INPUTS
    .sbf (with its .sbf.data payload)

SUPPORTED OUTPUTS
    .sbf   .csv   .json (summary)   .md (summary)

ACTIONS (can be repeated, in any order)
    -t, --translate         <x,y,z>          Translate points by (x, y, z)
    -N, --filter-nan                         Remove points with NaN or Inf values
    -V, --filter-value      <name,cmp,value> Keep points where <name> <cmp> <value>
                                               cmp ∈ {lt,lte,gt,gte,eq,neq}
    -B, --filter-box        <x,y,z,X,Y,Z>    Remove points outside box (min, max corners)
    -a, --add-index                          Add an 'index' scalar field (0..n-1)
    -d, --remove-field      <name>           Remove a scalar field
    -D, --remove-all-fields                  Remove every scalar field
    -n, --rename-field      <old=new>        Rename a scalar field
    -g, --global-shift      <x,y,z>          Set the global shift (coordinates unchanged)
    -G, --drop-global-shift                  Subtract the global shift from the coordinates

GLOBAL OPTIONS
    -h, --help                               Show this help and exit
    -v, --version                            Show version and exit
    -q, --quiet                              Suppress non-error output
        --verbose                            Show debug output
    -w, --overwrite                          Overwrite output file if it exists

EXAMPLES
    # Keep ground points and drop the classification field
    sbf-transform survey.sbf -V classification,eq,2 -d classification ground.sbf

    # Merge two tiles and share one global shift
    sbf-transform -w tileA.sbf tileB.sbf merged.sbf --global-shift=-300000,-5000000,0

    # Field statistics
    sbf-transform survey.sbf survey-stats.md
`;

// Node.js logger writing progress on a single line per level
const nodeLogger: Logger = {
    log: (...args) => console.log(...args),
    warn: (...args) => console.warn(...args),
    error: (...args) => console.error(...args),
    debug: (...args) => console.log(...args),
    output: (text) => {
        process.stdout.write(`${text}\n`);
    },
    onProgress: (node) => {
        if (node.step === 0) return;
        process.stdout.write(`  [${node.step}/${node.totalSteps}] ${node.stepName ?? ''}\n`);
    }
};

const formatError = (err: unknown) => {
    if (err instanceof SbfError) {
        return err.format();
    }
    return err instanceof Error ? err.message : String(err);
};

/**
 * Command-line entry point.
 *
 * @param args - Arguments, without the node executable and script path.
 * @returns The process exit code.
 */
const main = async (args: string[] = process.argv.slice(2)): Promise<number> => {
    const startTime = hrtime();

    logger.setLogger(nodeLogger);

    let parsed: ReturnType<typeof parseArguments>;
    try {
        parsed = parseArguments(args);
    } catch (err) {
        logger.error(formatError(err));
        return 1;
    }
    const { files, options } = parsed;

    logger.setLevel(options.quiet ? 'silent' : options.verbose ? 'verbose' : 'normal');

    logger.log(`sbf-transform v${version}`);

    if (options.version) {
        return 0;
    }

    if (files.length < 2 || options.help) {
        logger.error(usage);
        return options.help ? 0 : 1;
    }

    const inputArgs = files.slice(0, -1);
    const outputArg = files[files.length - 1];

    const outputFilename = resolve(outputArg.filename);

    try {
        const outputFormat = getOutputFormat(outputFilename);

        // check overwrite before doing any work
        if (!options.overwrite) {
            const targets = outputFormat === 'sbf' ? [outputFilename, `${outputFilename}.data`] : [outputFilename];
            for (const target of targets) {
                if (await fileExists(target)) {
                    logger.error(`File '${target}' already exists. Use -w option to overwrite.`);
                    return 1;
                }
            }
        }

        const fileSystem = new NodeReadFileSystem();

        // read and process inputs
        const documents = [];
        for (const inputArg of inputArgs) {
            const filename = resolve(inputArg.filename);
            const document = await readFile({
                filename,
                inputFormat: getInputFormat(filename),
                fileSystem
            });
            documents.push(processDocument(document, inputArg.processActions));
        }

        const document = processDocument(combine(documents), outputArg.processActions);

        logger.log(`Loaded ${document.numPoints} points with ${document.numFields} scalar fields`);

        await writeFile({
            filename: outputFilename,
            outputFormat,
            document
        }, new NodeFileSystem());
    } catch (err) {
        logger.error(formatError(err));
        return 1;
    }

    const endTime = hrtime(startTime);

    logger.log(`done in ${endTime[0] + endTime[1] / 1e9}s`);

    return 0;
};

export { main, parseArguments };
