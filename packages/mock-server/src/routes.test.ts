import { RequestError } from '@cutout/core';
import { describe, expect, it } from 'vitest';
import { allowedMethods, checkDims, parseIntegerList, parseRoute } from './routes';

describe('parseRoute', () => {
    it('recognizes every endpoint', () => {
        expect(parseRoute('/api/server/info')).toEqual({ kind: 'server-info' });
        expect(parseRoute('/api/datasets/list')).toEqual({ kind: 'datasets-list' });
        expect(parseRoute('/api/datasets/info/')).toEqual({ kind: 'datasets-info' });
        expect(parseRoute('/api/dataset/abc/new/grayscale8/vol')).toEqual({
            kind: 'create-volume',
            uuid: 'abc',
            typename: 'grayscale8',
            name: 'vol',
        });
        expect(parseRoute('/api/node/abc/vol/metadata')).toEqual({ kind: 'metadata', uuid: 'abc', name: 'vol' });
        expect(parseRoute('/api/node/abc/vol/raw/0_1_2/10_20_30/1,2,3')).toEqual({
            kind: 'raw',
            uuid: 'abc',
            name: 'vol',
            dims: '0_1_2',
            shape: '10_20_30',
            offset: '1,2,3',
        });
        expect(parseRoute('/api/repo/abc/instance')).toEqual({ kind: 'create-instance', uuid: 'abc' });
        expect(parseRoute('/api/node/abc/notes/keys')).toEqual({ kind: 'keys', uuid: 'abc', name: 'notes' });
        expect(parseRoute('/api/node/abc/notes/greeting')).toEqual({
            kind: 'value',
            uuid: 'abc',
            name: 'notes',
            key: 'greeting',
        });
    });
    it('decodes escaped segments', () => {
        expect(parseRoute('/api/node/abc/my%20volume/metadata')).toEqual({
            kind: 'metadata',
            uuid: 'abc',
            name: 'my volume',
        });
        expect(parseRoute('/api/node/abc/notes/a%2Fb')).toEqual({ kind: 'value', uuid: 'abc', name: 'notes', key: 'a/b' });
    });
    it('rejects anything else', () => {
        for (const path of [
            '/',
            '/api',
            '/api/datasets',
            '/api/datasets/list/extra',
            '/api/node/abc/vol/raw/0_1_2/10_20_30',
            '/api/node/abc/vol/raw',
            '/api/node/abc/notes/greeting/more',
            '/api/repo/abc/instances',
            '/api/node/abc/vol/raw/0_1_2/10_20_30/0_0_0/more',
            '/api/dataset/abc/old/grayscale8/vol',
            '/api/node/abc/%E0%A4%A/metadata',
            '/other/datasets/list',
        ]) {
            expect(() => parseRoute(path), path).toThrow(RequestError);
        }
    });
    it('knows which methods each endpoint takes', () => {
        expect(allowedMethods({ kind: 'datasets-list' })).toEqual(['GET']);
        expect(allowedMethods({ kind: 'create-volume', uuid: 'a', typename: 'b', name: 'c' })).toEqual(['POST']);
        expect(allowedMethods(parseRoute('/api/node/a/b/raw/0/1/0'))).toEqual(['GET', 'POST']);
        expect(allowedMethods(parseRoute('/api/repo/a/instance'))).toEqual(['POST']);
        expect(allowedMethods(parseRoute('/api/node/a/b/keys'))).toEqual(['GET']);
        expect(allowedMethods(parseRoute('/api/node/a/b/k'))).toEqual(['GET', 'POST']);
    });
});

describe('parseIntegerList', () => {
    it('splits on underscores and commas', () => {
        expect(parseIntegerList('10_20,30', 'shape')).toEqual([10, 20, 30]);
        expect(parseIntegerList('0', 'offset')).toEqual([0]);
    });
    it('rejects anything but non-negative integers', () => {
        for (const text of ['', '1__2', '-1_2', '1.5', 'a_b', '1_2_']) {
            expect(() => parseIntegerList(text, 'shape'), text).toThrow(RequestError);
        }
    });
});

describe('checkDims', () => {
    const labels = ['x', 'y', 'z'];

    it('accepts the index list and the labels in order', () => {
        for (const dims of ['0_1_2', '0,1,2', 'xyz', 'XYZ', 'x_y_z']) {
            expect(() => checkDims(dims, labels), dims).not.toThrow();
        }
        expect(() => checkDims('0', ['x'])).not.toThrow();
    });
    it('rejects other orders and other ranks', () => {
        for (const dims of ['0_2_1', 'zyx', '0_1', 'xy', '0_1_2_3', '012']) {
            expect(() => checkDims(dims, labels), dims).toThrow(RequestError);
        }
    });
});
