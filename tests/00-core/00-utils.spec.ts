import { describe, expect, it } from 'vitest';
import {
    decodePointerSegment,
    deepFreeze,
    encodeFragmentSegment,
    encodePointerSegment,
    getPathTemplateSignature,
    hasUriScheme,
    isHttpUrl,
    isUrl,
    optional,
    parsePointer,
    quoteList,
    toPointer,
} from '@src/core/utils/index.js';

describe('Core: Utils', () => {
    describe('JSON pointers', () => {
        it('should escape "~" before "/"', () => {
            expect(encodePointerSegment('a/b~c')).toBe('a~1b~0c');
            expect(encodePointerSegment(3)).toBe('3');
        });

        it('should decode "~01" to "~1"', () => {
            expect(decodePointerSegment('~01')).toBe('~1');
            expect(decodePointerSegment('a~1b~0c')).toBe('a/b~c');
        });

        it('should render structural paths as fragments', () => {
            expect(toPointer([])).toBe('#');
            expect(toPointer(['paths', '/pets/{id}', 'get', 'parameters', 0])).toBe('#/paths/~1pets~1{id}/get/parameters/0');
        });

        it('should parse fragments back into segments', () => {
            expect(parsePointer('#')).toEqual([]);
            expect(parsePointer('#/components/schemas/a~1b')).toEqual(['components', 'schemas', 'a/b']);
        });

        it('should reject fragments that are not pointers', () => {
            expect(parsePointer('#components')).toBeUndefined();
            expect(parsePointer('#/bad~2escape')).toBeUndefined();
        });

        it('should percent-decode a fragment before splitting it', () => {
            expect(parsePointer('#/definitions/Page%C2%ABUser%C2%BB')).toEqual(['definitions', 'Page«User»']);
            expect(parsePointer('#/paths/~1a~1%7Bid%7D/get')).toEqual(['paths', '/a/{id}', 'get']);
            expect(parsePointer('#/a%2Fb')).toEqual(['a', 'b']);
            expect(parsePointer('#/bad%E0%A4%A')).toBeUndefined();
        });

        it('should escape percent signs for fragments', () => {
            expect(encodeFragmentSegment('50%/off')).toBe('50%25~1off');
            expect(parsePointer(`#/${encodeFragmentSegment('50%/off')}`)).toEqual(['50%/off']);
        });
    });

    describe('getPathTemplateSignature', () => {
        it('should erase variable names', () => {
            expect(getPathTemplateSignature('/users/{id}/details')).toBe('/users/{}/details');
            expect(getPathTemplateSignature('/users/{name}/details')).toBe('/users/{}/details');
        });

        it('should keep partially templated segments', () => {
            expect(getPathTemplateSignature('/files/{name}.json')).toBe('/files/{name}.json');
        });
    });

    describe('URLs', () => {
        it('should accept absolute URLs of any scheme', () => {
            expect(isUrl('urn:example:pet')).toBe(true);
            expect(isUrl('pets.yaml')).toBe(false);
        });

        it('should only accept http(s) for isHttpUrl', () => {
            expect(isHttpUrl('https://example.com/docs')).toBe(true);
            expect(isHttpUrl('ftp://example.com')).toBe(false);
            expect(isHttpUrl('http://')).toBe(false);
        });

        it('should detect a URI scheme prefix', () => {
            expect(hasUriScheme('https://example.com')).toBe(true);
            expect(hasUriScheme('./pets.yaml')).toBe(false);
        });
    });

    it('quoteList should join names for messages', () => {
        expect(quoteList([])).toBe('');
        expect(quoteList(['a'])).toBe('"a"');
        expect(quoteList(['a', 'b', 'c'])).toBe('"a", "b" and "c"');
    });

    it('optional should omit undefined values', () => {
        expect(optional('summary', undefined)).toEqual({});
        expect(optional('summary', 'text')).toEqual({ summary: 'text' });
    });

    it('deepFreeze should freeze nested objects and map values', () => {
        const inner = { name: 'Pet' };
        const value = { list: [{ a: 1 }], map: new Map([['pet', inner]]) };
        deepFreeze(value);
        expect(Object.isFrozen(value)).toBe(true);
        expect(Object.isFrozen(value.list[0])).toBe(true);
        expect(Object.isFrozen(inner)).toBe(true);
    });
});
