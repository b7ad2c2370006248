import { describe, it, expect } from 'vitest';
import { resolveShell, shellCommand } from './shell.js';

describe('shellCommand', () => {
    it('runs lines through $SHELL -c', () => {
        expect(shellCommand('ls -la', { SHELL: '/bin/zsh' })).toEqual({ file: '/bin/zsh', args: ['-c', 'ls -la'] });
    });

    it('falls back to /bin/sh', () => {
        expect(resolveShell({})).toBe('/bin/sh');
        expect(resolveShell({ SHELL: '  ' })).toBe('/bin/sh');
    });

    it('runs alias: lines in an interactive shell', () => {
        expect(shellCommand('alias: ll src', { SHELL: '/bin/bash' })).toEqual({ file: '/bin/bash', args: ['-ic', 'll src'] });
    });
});
