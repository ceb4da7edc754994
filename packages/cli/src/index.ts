#!/usr/bin/env node
import { createRequire } from 'module';
import { Command } from 'commander';
import { handleRunCommand } from './cli/commands/run.js';
import { collect, handleCliOptionsError } from './cli/utils/options.js';

// Use createRequire to import package.json without experimental warning
const require = createRequire(import.meta.url);

function readVersion(): string {
    const pkg: unknown = require('../package.json');
    return typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
        ? pkg.version
        : '0.0.0';
}

const program = new Command();

program
    .name('steptrace')
    .description('Trace CI steps as OpenTelemetry spans, logs and metrics')
    .version(readVersion(), '-v, --version', 'output the current version')
    .enablePositionalOptions();

program
    .command('run')
    .description('Run a shell command as one traced step')
    .argument('<step>', 'step name; the step span is named step-<step>')
    .argument('<command...>', 'command to run, given after --')
    .option('-a, --attr <key=value>', 'step attribute, repeatable', collect, [])
    .option('-l, --log-file <path>', 'tee combined output to this file and to OTLP logs')
    .option('-s, --span <name>', 'name of the span around the command (default: executable name)')
    .option('-r, --retry', 'retry the command with exponential backoff')
    .option('--max-attempts <count>', 'attempts before giving up (default: RETRY_COUNT or 30)')
    .option('--initial-delay <seconds>', 'first backoff delay (default: RETRY_DELAY or 1)')
    .option('--max-delay <seconds>', 'backoff ceiling (default: RETRY_MAX_DELAY or 60)')
    .passThroughOptions()
    .action(async (step: string, command: string[], options: Record<string, unknown>) => {
        try {
            process.exitCode = await handleRunCommand({ ...options, step, command });
        } catch (error) {
            process.exitCode = handleCliOptionsError(error);
        }
    });

await program.parseAsync(process.argv);
