#!/usr/bin/env node
/**
 * @file assetflow CLI entry point
 *
 * @module cli
 */

import fs from 'fs';
import { cli_run } from './assetflow.js';

process.exitCode = cli_run(process.argv.slice(2), {
    stdout: (line: string): void => console.log(line),
    stderr: (line: string): void => console.error(line),
    file_read: (path: string): string => fs.readFileSync(path, 'utf-8'),
});
