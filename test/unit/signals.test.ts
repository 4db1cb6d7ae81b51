import { describe, it, expect } from 'vitest';
import {
    exitCodeFor,
    exitWithCode,
    helpRequested,
    reportedError,
    subcommandHandled,
} from '../../src/core/signals.js';

describe('Control signals', () => {
    it('should exit 0 without a signal', () => {
        expect(exitCodeFor(undefined)).toBe(0);
    });

    it('should exit 0 for help and handled subcommands', () => {
        expect(exitCodeFor(helpRequested())).toBe(0);
        expect(exitCodeFor(subcommandHandled())).toBe(0);
    });

    it('should exit 1 for a reported error', () => {
        expect(exitCodeFor(reportedError(new Error('already shown')))).toBe(1);
    });

    it('should exit with an explicit code', () => {
        expect(exitCodeFor(exitWithCode(3))).toBe(3);
        expect(exitCodeFor(exitWithCode(0))).toBe(0);
    });
});
