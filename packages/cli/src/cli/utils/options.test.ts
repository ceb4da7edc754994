import { afterEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';
import { USAGE_EXIT_CODE, collect, handleCliOptionsError } from './options.js';

describe('collect', () => {
    it('appends each occurrence in order', () => {
        expect(collect('b=2', collect('a=1', []))).toEqual(['a=1', 'b=2']);
    });
});

describe('handleCliOptionsError', () => {
    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('prints each validation issue and returns the usage exit code', () => {
        const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
        const result = z.object({ command: z.array(z.string()).min(1, 'A command is required') }).safeParse({
            command: [],
        });

        expect(result.success).toBe(false);
        expect(handleCliOptionsError(result.error)).toBe(USAGE_EXIT_CODE);
        expect(consoleSpy).toHaveBeenCalledWith(
            expect.stringContaining("Option 'command': A command is required")
        );
    });

    it('rethrows anything else', () => {
        const failure = new Error('boom');

        expect(() => handleCliOptionsError(failure)).toThrow(failure);
    });
});
