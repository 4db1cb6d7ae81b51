/**
 * Error report shown to the user when a command cannot proceed.
 *
 * The layout is fixed: headline, the indented message, then remediation
 * pointers, led by the error's own suggestion when it carries one. The terminal variant adds colour escapes and nothing else, so
 * both renderings carry the same text.
 */

import { isVolctlError } from '../core/errors.js';
import { paletteFor, type Io } from '../utils/ui.js';

export const DOCS_URL = 'https://volctl.dev/docs';

export function formatError(error: Error, colorize: boolean): string {
    const c = paletteFor(colorize);
    const word = c.bgRed('error');
    const hint = isVolctlError(error) && error.suggestion ? [`  - ${error.suggestion}`] : [];

    return [
        `Oops, an ${word} occurred!`,
        '',
        `  ${c.red(error.message)}`,
        '',
        `To correct the ${word} please review:`,
        '',
        ...hint,
        `  - Debug output by using the flag "${c.cyan('-l debug')}"`,
        `  - The volctl documentation at ${c.bgBlue(DOCS_URL)}`,
        '  - The online help below',
        '',
    ].join('\n');
}

export class ErrorPresenter {
    constructor(private readonly io: Io) {}

    /**
     * Writes the report to standard error
     */
    render(error: Error, isTerminal: boolean = this.io.isTerminal): void {
        this.io.err(formatError(error, isTerminal));
    }
}
