import { describe, it, expect } from 'vitest';
import { DOCS_URL, ErrorPresenter, formatError } from '../../src/cli/presenter.js';
import { PermissionDeniedError } from '../../src/core/errors.js';
import { bufferIo, stripAnsi } from '../helpers.js';

const PLAIN = [
    'Oops, an error occurred!',
    '',
    '  volume vol-1 is busy',
    '',
    'To correct the error please review:',
    '',
    '  - Debug output by using the flag "-l debug"',
    `  - The volctl documentation at ${DOCS_URL}`,
    '  - The online help below',
    '',
].join('\n');

describe('ErrorPresenter', () => {
    describe('formatError', () => {
        it('should render the plain report byte for byte', () => {
            expect(formatError(new Error('volume vol-1 is busy'), false)).toBe(PLAIN);
        });

        it('should lead the remediation list with the error suggestion', () => {
            expect(formatError(new PermissionDeniedError('started'), false)).toBe(
                [
                    'Oops, an error occurred!',
                    '',
                    '  volctl can only be started by root',
                    '',
                    'To correct the error please review:',
                    '',
                    '  - Re-run the command with elevated privileges',
                    '  - Debug output by using the flag "-l debug"',
                    `  - The volctl documentation at ${DOCS_URL}`,
                    '  - The online help below',
                    '',
                ].join('\n')
            );
        });

        it('should show the suggestion uncoloured on a terminal', () => {
            const colored = formatError(new PermissionDeniedError('started'), true);
            expect(colored).toContain('\n  - Re-run the command with elevated privileges\n');
            expect(stripAnsi(colored)).toBe(formatError(new PermissionDeniedError('started'), false));
        });

        it('should be stable across calls', () => {
            const error = new Error('volume vol-1 is busy');
            expect(formatError(error, false)).toBe(formatError(error, false));
        });

        it('should only add colour escapes in the terminal variant', () => {
            const colored = formatError(new Error('volume vol-1 is busy'), true);
            expect(colored).not.toBe(PLAIN);
            expect(stripAnsi(colored)).toBe(PLAIN);
            expect(colored).toContain('\x1b[31mvolume vol-1 is busy\x1b[39m');
            expect(colored).toContain('\x1b[41merror\x1b[49m');
        });
    });

    describe('render', () => {
        it('should write to standard error only', () => {
            const io = bufferIo();
            new ErrorPresenter(io).render(new Error('volume vol-1 is busy'));
            expect(io.stderr).toBe(PLAIN);
            expect(io.stdout).toBe('');
        });

        it('should follow the injected terminal flag', () => {
            const io = bufferIo(false);
            new ErrorPresenter(io).render(new Error('volume vol-1 is busy'), true);
            expect(io.stderr).toBe(formatError(new Error('volume vol-1 is busy'), true));
        });

        it('should default to the capability of its output', () => {
            const io = bufferIo(true);
            new ErrorPresenter(io).render(new Error('volume vol-1 is busy'));
            expect(stripAnsi(io.stderr)).toBe(PLAIN);
            expect(io.stderr).not.toBe(PLAIN);
        });
    });
});
