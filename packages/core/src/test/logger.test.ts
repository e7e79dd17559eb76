import { describe, expect, it, vi } from 'vitest';
import { Logger, isLogLevel, type LogSink } from '../logger';

function fakeSink(): LogSink {
    return {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn(),
        log: vi.fn(),
        dir: vi.fn(),
    };
}

describe('Logger', () => {
    it('drops messages below its level', () => {
        const sink = fakeSink();
        const log = new Logger('test', { level: 'warn', sink });
        log.debug('a');
        log.info('b');
        log.warn('c');
        log.error('d');
        expect(sink.debug).not.toHaveBeenCalled();
        expect(sink.info).not.toHaveBeenCalled();
        expect(sink.warn).toHaveBeenCalledTimes(1);
        expect(sink.error).toHaveBeenCalledTimes(1);
    });
    it('says nothing at all at level none', () => {
        const sink = fakeSink();
        const log = new Logger('test', { level: 'none', sink });
        log.error('still quiet');
        expect(sink.error).not.toHaveBeenCalled();
    });
    it('tags each line with its name and level', () => {
        const sink = fakeSink();
        const log = new Logger('codec', { level: 'debug', sink });
        log.info('hello', 42);
        expect(sink.info).toHaveBeenCalledWith(expect.stringMatching(/^\[.+\] \[codec\] \[INFO\] hello$/), 42);
    });
    it('children share the sink and level of their parent', () => {
        const sink = fakeSink();
        const log = new Logger('server', { level: 'info', sink }).child('engine');
        log.debug('hidden');
        log.info('shown');
        expect(log.currentLevel).toBe('info');
        expect(sink.info).toHaveBeenCalledWith(expect.stringContaining('[server:engine]'));
        expect(sink.debug).not.toHaveBeenCalled();
    });
});

describe('isLogLevel', () => {
    it('accepts only the known levels', () => {
        expect(isLogLevel('debug')).toBe(true);
        expect(isLogLevel('none')).toBe(true);
        expect(isLogLevel('verbose')).toBe(false);
        expect(isLogLevel(3)).toBe(false);
    });
});
