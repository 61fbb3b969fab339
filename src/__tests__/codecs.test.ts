import { describe, expect, it } from 'vitest';
import { field, flags, float, hexInteger, integer, lookup, onOff, scaled, text } from '../codecs';
import { DecodeError, EncodeError } from '../errors';

describe('codecs', () => {
    it('parses floats and rejects empty or non-numeric payloads', () => {
        expect(float.decode(' 23.5 ')).toBe(23.5);
        expect(float.encode(1.25)).toBe('1.25');
        expect(() => float.decode('')).toThrow(DecodeError);
        expect(() => float.decode('abc')).toThrow(DecodeError);
    });

    it('only accepts finite decimal numbers', () => {
        expect(float.decode('-1.5e-3')).toBe(-0.0015);
        expect(float.decode('.5')).toBe(0.5);
        expect(() => float.decode('0x1A')).toThrow('not a number');
        expect(() => float.decode('Infinity')).toThrow('not a number');
        expect(() => float.decode('1e400')).toThrow('out of range');
        expect(() => integer.decode('0b11')).toThrow(DecodeError);
    });

    it('rejects fractional integers', () => {
        expect(integer.decode('42')).toBe(42);
        expect(integer.encode(41.6)).toBe('42');
        expect(() => integer.decode('4.2')).toThrow('not an integer');
    });

    it('uses upper case hexadecimal', () => {
        expect(hexInteger.encode(255)).toBe('FF');
        expect(hexInteger.decode('1a')).toBe(26);
        expect(() => hexInteger.decode('G1')).toThrow(DecodeError);
    });

    it('scales wire integers', () => {
        const tenths = scaled(0.1);
        expect(tenths.encode(12.5)).toBe('125');
        expect(tenths.decode('125')).toBe(12.5);
        expect(tenths.decode('3')).toBe(0.3);
        expect(tenths.encode(0.3)).toBe('3');
        expect(() => tenths.decode('12.5')).toThrow(DecodeError);
    });

    it('scales by whole factors too', () => {
        const hundreds = scaled(100);
        expect(hundreds.encode(1200)).toBe('12');
        expect(hundreds.decode('12')).toBe(1200);
    });

    it('maps ON/OFF flags', () => {
        expect(onOff.encode(true)).toBe('ON');
        expect(onOff.decode('off')).toBe(false);
        expect(onOff.decode('1')).toBe(true);
        expect(() => onOff.decode('maybe')).toThrow(DecodeError);
    });

    it('looks up labels in both directions', () => {
        const unit = lookup({ '0': 'mbar', '1': 'Torr' });
        expect(unit.decode('1')).toBe('Torr');
        expect(unit.encode('mbar')).toBe('0');
        expect(() => unit.decode('7')).toThrow('unknown code');
        expect(() => unit.encode('psi')).toThrow(EncodeError);
    });

    it('picks one field of a separated payload', () => {
        expect(field(',', 0, float).decode('23.0,C')).toBe(23);
        expect(field(',', 1, text).decode('23.0, C')).toBe('C');
        expect(() => field(',', 2, text).decode('23.0,C')).toThrow('missing field 2');
    });

    it('lists the labels of set bits', () => {
        const status = flags({ '0x0001': 'interlock', '0x0004': 'overtemp', '8': 'door open' });
        expect(status.decode('5')).toEqual(['interlock', 'overtemp']);
        expect(status.decode('0')).toEqual([]);
        expect(status.encode(['door open', 'interlock'])).toBe('9');
        expect(() => status.encode(['smoke'])).toThrow('Cannot encode smoke: unknown flag');
    });
});

describe('codec round trips', () => {
    it('give back every float', () => {
        for (const value of [0, -0.5, 1.25, 0.1, 1 / 3, 6.02e23, -1e-7, Number.MAX_SAFE_INTEGER]) {
            expect(float.decode(float.encode(value))).toBe(value);
        }
    });

    it('give back every integer', () => {
        for (const value of [0, 1, -42, 65535, -2147483648]) {
            expect(integer.decode(integer.encode(value))).toBe(value);
        }
        for (const value of [0, 10, 255, 0xbeef]) {
            expect(hexInteger.decode(hexInteger.encode(value))).toBe(value);
        }
    });

    it('give back every multiple of the scale factor', () => {
        const codecs: Array<[number, number]> = [[0.1, 10], [0.01, 100], [0.001, 1000]];
        for (const [factor, steps] of codecs) {
            const codec = scaled(factor);
            for (let n = -2 * steps; n <= 2 * steps; n++) {
                const value = n / steps;
                expect(codec.decode(codec.encode(value))).toBe(value);
            }
        }
    });

    it('give back labels, flags and text', () => {
        const unit = lookup({ '0': 'mbar', '1': 'Torr', '2': 'Pascal' });
        for (const label of ['mbar', 'Torr', 'Pascal']) {
            expect(unit.decode(unit.encode(label))).toBe(label);
        }
        const status = flags({ '1': 'a', '2': 'b', '4': 'c' });
        for (const set of [[], ['a'], ['b', 'c'], ['a', 'b', 'c']]) {
            expect(status.decode(status.encode(set))).toEqual(set);
        }
        for (const value of [true, false]) {
            expect(onOff.decode(onOff.encode(value))).toBe(value);
        }
        for (const value of ['', 'hello', ' padded ', 'ID,187,1234']) {
            expect(text.decode(text.encode(value))).toBe(value);
        }
        const reading = field(',', 0, float);
        expect(reading.decode(reading.encode(23.5))).toBe(23.5);
    });
});
