import { describe, it, expect } from 'vitest';
import { isRunnerError } from '../errors.js';
import { configFrom } from '../testing/fixtures.js';
import { findOwningProject, resolveCommand } from './resolver.js';

const config = configFrom(`
commands:
  build: make build
  test: npm test
  deploy: ./deploy.sh
projects:
  api:
    path: ~/api
    commands:
      - test
      - command_name: build
        alias: api-build
  web:
    path: ~/web
    commands:
      - command_name: build
        alias: wb
      - command_name: build
        alias: deploy
`);

describe('resolveCommand', () => {
    it('resolves an unbound command as global', () => {
        const ref = resolveCommand(config, 'deploy');
        expect(ref.kind).toBe('global');
        expect(ref.definition.template).toBe('./deploy.sh');
        expect(ref.project).toBeUndefined();
        expect(ref.invokedAs).toBe('deploy');
    });

    it('resolves a command bound without alias to its project', () => {
        const ref = resolveCommand(config, 'test');
        expect(ref.kind).toBe('project');
        expect(ref.project?.name).toBe('api');
    });

    it('keeps a command bound only through aliases global', () => {
        const ref = resolveCommand(config, 'build');
        expect(ref.kind).toBe('global');
        expect(ref.project).toBeUndefined();
    });

    it('resolves an alias to its command and project', () => {
        const ref = resolveCommand(config, 'wb');
        expect(ref.kind).toBe('alias');
        expect(ref.definition.name).toBe('build');
        expect(ref.project?.name).toBe('web');
        expect(ref.invokedAs).toBe('wb');
    });

    it('prefers a command name over an alias with the same name', () => {
        const ref = resolveCommand(config, 'deploy');
        expect(ref.kind).toBe('global');
        expect(ref.definition.name).toBe('deploy');
    });

    it('returns the same reference on repeated calls', () => {
        expect(resolveCommand(config, 'api-build')).toEqual(resolveCommand(config, 'api-build'));
    });

    it('fails with CommandNotFound for unknown names', () => {
        expect(() => resolveCommand(config, 'nope')).toThrow("Command or alias 'nope' not found");
        try {
            resolveCommand(config, 'nope');
        } catch (err) {
            expect(isRunnerError(err, 'CommandNotFound')).toBe(true);
        }
    });

    it('fails when an alias points at a missing command', () => {
        const broken = configFrom(`
commands: {}
projects:
  api:
    path: ~/api
    commands:
      - command_name: ghost
        alias: g
`);
        expect(() => resolveCommand(broken, 'g'))
            .toThrow("Alias 'g' in project 'api' references non-existent command 'ghost'");
    });
});

describe('findOwningProject', () => {
    it('ignores aliased bindings', () => {
        expect(findOwningProject(config, 'build')).toBeUndefined();
        expect(findOwningProject(config, 'test')?.name).toBe('api');
    });
});
