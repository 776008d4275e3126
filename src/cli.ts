#!/usr/bin/env node
import { Command } from 'commander';
import { registerCheckCommand } from './commands/checkCommand';
import { registerHookCommands } from './commands/hookCommands';
import { isUserError, WsCheckError } from './utils/errors';

const VERSION = '0.1.0';

const program = new Command();

program
    .name('wscheck')
    .description('checks changed files for tabs, trailing whitespace and blank-only lines')
    .version(VERSION);

registerCheckCommand(program);
registerHookCommands(program);

async function main(): Promise<void> {
    try {
        await program.parseAsync(process.argv);
    } catch (error) {
        console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
        if (error instanceof WsCheckError && error.details) {
            console.error(`  Details: ${typeof error.details === 'string' ? error.details : JSON.stringify(error.details, null, 2)}`);
        }
        process.exitCode = isUserError(error) ? 2 : 1;
    }
}

void main();
