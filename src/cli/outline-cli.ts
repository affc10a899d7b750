#!/usr/bin/env node
/**
 * CLI for hack-outline
 */

import { Command } from 'commander';
import * as fs from 'fs';
import { modeOf, runOutline } from './run-outline';

const program = new Command();

program
    .name('hack-outline')
    .description('Print the declaration outline of a Hack file')
    .version('0.1.0')
    .argument('[file]', 'Hack source file, or - for stdin', '-')
    .option('--legacy', 'Flat JSON list in the legacy --outline format (default)')
    .option('--json', 'Structured outline tree as JSON')
    .option('--print', 'Indented text dump for debugging')
    .action((file: string, options: { legacy?: boolean; json?: boolean; print?: boolean }) => {
        let content: string;
        try {
            content = fs.readFileSync(file === '-' ? 0 : file, 'utf-8');
        } catch (error) {
            console.error(`Cannot read ${file === '-' ? 'stdin' : file}:`, error instanceof Error ? error.message : error);
            process.exit(1);
        }

        runOutline(content, modeOf(options), process.stdout, file === '-' ? '' : file);
    });

program.parse(process.argv);
