import { describe, test, expect } from '@jest/globals';
import fc from 'fast-check';
import { closestMatch, editDistance } from '../EditDistance.js';

describe('Edit Distance', () => {
    test('1.1 Should count insertions, deletions and substitutions', () => {
        expect(editDistance('kitten', 'sitting')).toBe(3);
        expect(editDistance('flaw', 'lawn')).toBe(2);
        expect(editDistance('user', 'users')).toBe(1);
        expect(editDistance('user', 'usage')).toBe(3);
    });

    test('1.2 Should return the other length against an empty string', () => {
        expect(editDistance('', 'abc')).toBe(3);
        expect(editDistance('abc', '')).toBe(3);
        expect(editDistance('', '')).toBe(0);
    });

    test('1.3 Should pick the nearest candidate', () => {
        expect(closestMatch('user', ['usage', 'users'])).toBe('users');
        expect(closestMatch('lsit', ['create', 'list'])).toBe('list');
    });

    test('1.4 Should keep the first candidate on a tie', () => {
        expect(closestMatch('ab', ['ax', 'ay'])).toBe('ax');
    });

    test('1.5 Should return undefined without candidates', () => {
        expect(closestMatch('user', [])).toBeUndefined();
        expect(closestMatch('user', new Map<string, number>().keys())).toBeUndefined();
    });

    test('1.6 Should be a metric on short strings', () => {
        const word = fc.string({ maxLength: 8 });
        fc.assert(fc.property(word, word, word, (a, b, c) => {
            expect(editDistance(a, a)).toBe(0);
            expect(editDistance(a, b)).toBe(editDistance(b, a));
            expect(editDistance(a, c)).toBeLessThanOrEqual(editDistance(a, b) + editDistance(b, c));
            expect(editDistance(a, b)).toBeLessThanOrEqual(Math.max(a.length, b.length));
        }));
    });
});
