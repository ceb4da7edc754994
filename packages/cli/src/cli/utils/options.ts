import { z } from 'zod';
import chalk from 'chalk';

/**
 * Exit code for bad invocations, distinct from any step's own failure
 */
export const USAGE_EXIT_CODE = 2;

/**
 * Commander accumulator for repeatable options
 */
export function collect(value: string, previous: string[]): string[] {
    return [...previous, value];
}

/**
 * Prints option validation errors and returns the usage exit code.
 * Anything other than a validation error is rethrown.
 */
export function handleCliOptionsError(error: unknown): number {
    if (!(error instanceof z.ZodError)) {
        throw error;
    }
    console.error(chalk.red('❌ Invalid command-line options detected:'));
    error.errors.forEach((err) => {
        const fieldName = err.path.join('.') || 'Unknown Option';
        console.error(chalk.red(`   • Option '${fieldName}': ${err.message}`));
    });
    console.error(chalk.gray('\nRun with --help for usage details.'));
    return USAGE_EXIT_CODE;
}
