import { describe, it, expect } from 'vitest';
import {
    CharMeasurer,
    WordMeasurer,
    TokenMeasurer,
    createMeasurer,
} from '../src/chunking/measurer.js';
import { ConfigurationError, MeasurementError } from '../src/errors/index.js';

describe('UnitMeasurer', () => {
    it('counts UTF-16 code units for the char unit', () => {
        expect(new CharMeasurer().measure('héllo')).toBe(5);
        expect(new CharMeasurer().measure('')).toBe(0);
    });

    it('counts whitespace-separated words for the word unit', () => {
        const measurer = new WordMeasurer();
        expect(measurer.measure('  two  words\n')).toBe(2);
        expect(measurer.measure('one\ttwo\nthree')).toBe(3);
        expect(measurer.measure('   ')).toBe(0);
    });

    it('delegates to the tokenizer for the token unit', () => {
        const measurer = new TokenMeasurer((text) => text.length * 2);
        expect(measurer.measure('abc')).toBe(6);
        expect(measurer.unit).toBe('token');
    });

    it('wraps tokenizer failures in MeasurementError', () => {
        const failure = new Error('boom');
        const measurer = new TokenMeasurer(() => {
            throw failure;
        });

        try {
            measurer.measure('text');
            expect.fail('expected a MeasurementError');
        } catch (e: unknown) {
            expect(e).toBeInstanceOf(MeasurementError);
            if (e instanceof MeasurementError) {
                expect(e.message).toBe('Tokenizer failed: boom');
                expect(e.code).toBe('MEASUREMENT_ERROR');
                expect(e.tokenizerError).toBe(failure);
            }
        }
    });

    it('rejects counts that are not non-negative integers', () => {
        expect(() => new TokenMeasurer(() => 1.5).measure('x')).toThrow(
            'Tokenizer returned 1.5; expected a non-negative integer'
        );
        expect(() => new TokenMeasurer(() => -1).measure('x')).toThrow(MeasurementError);
        expect(() => new TokenMeasurer(() => Number.NaN).measure('x')).toThrow(MeasurementError);
    });

    it('requires a tokenizer for the token unit', () => {
        expect(() => createMeasurer('token')).toThrow(ConfigurationError);
        expect(createMeasurer('word').unit).toBe('word');
        expect(createMeasurer('token', (text) => text.length).measure('four')).toBe(4);
    });
});
