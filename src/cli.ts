#!/usr/bin/env node
import { main } from './index';
import { logger } from './lib/utils/logger';

main().then((code) => {
    process.exitCode = code;
}, (err: unknown) => {
    logger.error(err);
    process.exitCode = 1;
});
