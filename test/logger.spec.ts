// test/logger.spec.ts
import {describe, it, expect} from 'vitest';
import {isLogLevel, Logger, type LogSink} from '../src/util/logger';

function capture(): {sink: LogSink; lines: Array<[string, string]>} {
    const lines: Array<[string, string]> = [];
    return {lines, sink: (level, line) => lines.push([level, line])};
}

describe('Logger', () => {
    it('drops messages above the current level', () => {
        const {sink, lines} = capture();
        const logger = new Logger({level: 'warn', sink});

        logger.debug('hidden');
        logger.info('hidden');
        logger.warn('careful');
        logger.error('broken');

        expect(lines.map(([level]) => level)).toEqual(['warn', 'error']);
        expect(lines[0][1]).toContain('careful');
    });

    it('logs nothing when silent', () => {
        const {sink, lines} = capture();
        const logger = new Logger({level: 'silent', sink});

        logger.error('nothing');
        expect(lines).toEqual([]);
    });

    it('composes prefixes and shares the level with children', () => {
        const {sink, lines} = capture();
        const root = new Logger({level: 'info', prefix: '[root]', sink});
        const child = root.child('[child]');

        child.debug('before');
        root.setLevel('debug');
        child.debug('after');

        expect(lines).toHaveLength(1);
        expect(lines[0][0]).toBe('debug');
        expect(lines[0][1]).toContain('[root][child]');
        expect(lines[0][1]).toContain('after');

        child.setLevel('silent');
        expect(root.getLevel()).toBe('silent');
    });

    it('prints error messages rather than error objects', () => {
        const {sink, lines} = capture();
        new Logger({sink}).error(new Error('boom'));

        expect(lines[0][1]).toContain('boom');
        expect(lines[0][1]).not.toContain('Error:');
    });
});

describe('isLogLevel', () => {
    it('accepts only known levels', () => {
        expect(isLogLevel('debug')).toBe(true);
        expect(isLogLevel('verbose')).toBe(false);
        expect(isLogLevel(undefined)).toBe(false);
    });
});
