import { describe, it, expect } from 'vitest';
import { ExtractIdentifierParts, ExtractWords, LooksLikeCompoundWord } from '../src/Common/WordExtractor.js';

function words(iterable: Iterable<{ word: string }>): string[] {
    return Array.from(iterable, match => {
        return match.word;
    });
}

describe('ExtractWords', () => {
    it('should find runs of 3 or more alphanumerics with their offsets', () => {
        expect([...ExtractWords("it wasn't here, ok? abc123")]).toEqual([
            { word: "wasn't", offset: 3 },
            { word: 'here', offset: 10 },
            { word: 'abc123', offset: 20 },
        ]);
    });

    it('should not attach a bare trailing apostrophe', () => {
        expect([...ExtractWords("dogs' toys")]).toEqual([
            { word: 'dogs', offset: 0 },
            { word: 'toys', offset: 6 },
        ]);
    });

    it('should split snake_case names into separate words', () => {
        expect([...ExtractWords('call get_teh_value')]).toEqual([
            { word: 'call', offset: 0 },
            { word: 'get', offset: 5 },
            { word: 'teh', offset: 9 },
            { word: 'value', offset: 13 },
        ]);
    });

    it('should restart on every call', () => {
        const text = 'one two three';
        expect(words(ExtractWords(text))).toEqual(['one', 'two', 'three']);
        expect(words(ExtractWords(text))).toEqual(['one', 'two', 'three']);
    });
});

describe('ExtractIdentifierParts', () => {
    it('should split camelCase and acronyms', () => {
        expect(words(ExtractIdentifierParts('parseHTMLFile'))).toEqual(['parse', 'HTML', 'File']);
        expect(words(ExtractIdentifierParts('XMLParser'))).toEqual(['XML', 'Parser']);
    });

    it('should split snake_case', () => {
        expect(words(ExtractIdentifierParts('snake_case_name'))).toEqual(['snake', 'case', 'name']);
    });

    it('should report offsets within the identifier', () => {
        expect([...ExtractIdentifierParts('getHTMLTeh')]).toEqual([
            { word: 'get', offset: 0 },
            { word: 'HTML', offset: 3 },
            { word: 'Teh', offset: 7 },
        ]);
    });

    it('should drop a single capital followed by a word', () => {
        expect(words(ExtractIdentifierParts('ABar'))).toEqual(['Bar']);
    });
});

describe('LooksLikeCompoundWord', () => {
    it('should detect embedded names', () => {
        expect(LooksLikeCompoundWord('getTehValue')).toBe(true);
        expect(LooksLikeCompoundWord('HTMLParser')).toBe(true);
    });

    it('should reject plain words', () => {
        expect(LooksLikeCompoundWord('Hello')).toBe(false);
        expect(LooksLikeCompoundWord('HELLO')).toBe(false);
        expect(LooksLikeCompoundWord('hello')).toBe(false);
        expect(LooksLikeCompoundWord('Snake_case')).toBe(false);
    });
});
