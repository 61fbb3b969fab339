import { DecodeError, EncodeError } from './errors';

/**
 * Conversion between the typed value a caller sees (degrees, volts, a flag)
 * and the string the instrument puts on the wire.
 *
 * `decode` must throw {@link DecodeError} on malformed payloads instead of
 * returning a default.
 */
export interface Codec<T> {
    encode(value: T): string;
    decode(wire: string): T;
    /** Ordering used for bounds checks. Numbers are ordered without it. */
    compare?(a: T, b: T): number;
}

// Plain decimal with optional exponent; no hex, no Infinity
const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

function parseNumber(wire: string): number {
    const trimmed = wire.trim();
    if (trimmed === '') throw new DecodeError(wire, 'empty payload');
    if (!DECIMAL.test(trimmed)) throw new DecodeError(wire, 'not a number');
    const value = Number(trimmed);
    if (!Number.isFinite(value)) throw new DecodeError(wire, 'out of range');
    return value;
}

export const text: Codec<string> = {
    encode: (value) => value,
    decode: (wire) => wire,
    compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0)
};

export const float: Codec<number> = {
    encode: (value) => String(value),
    decode: parseNumber,
    compare: (a, b) => a - b
};

export const integer: Codec<number> = {
    encode: (value) => String(Math.round(value)),
    decode: (wire) => {
        const value = parseNumber(wire);
        if (!Number.isInteger(value)) throw new DecodeError(wire, 'not an integer');
        return value;
    },
    compare: (a, b) => a - b
};

export const hexInteger: Codec<number> = {
    encode: (value) => Math.round(value).toString(16).toUpperCase(),
    decode: (wire) => {
        const trimmed = wire.trim();
        if (!/^[0-9a-fA-F]+$/.test(trimmed)) throw new DecodeError(wire, 'not a hexadecimal number');
        return parseInt(trimmed, 16);
    },
    compare: (a, b) => a - b
};

/**
 * Integer on the wire, scaled value for the caller: with a factor of 0.1 the
 * wire value `125` reads as `12.5`. Decimal fractions (0.1, 0.001) divide by
 * their integer reciprocal so `0.3` comes back as `0.3`.
 */
export function scaled(factor: number): Codec<number> {
    const reciprocal = Math.round(1 / factor);
    const divides = factor < 1 && Math.abs(1 / factor - reciprocal) < 1e-9;
    return {
        encode: (value) => String(Math.round(divides ? value * reciprocal : value / factor)),
        decode: (wire) => {
            const raw = integer.decode(wire);
            return divides ? raw / reciprocal : raw * factor;
        },
        compare: (a, b) => a - b
    };
}

export const onOff: Codec<boolean> = {
    encode: (value) => (value ? 'ON' : 'OFF'),
    decode: (wire) => {
        const trimmed = wire.trim().toUpperCase();
        if (trimmed === 'ON' || trimmed === '1') return true;
        if (trimmed === 'OFF' || trimmed === '0') return false;
        throw new DecodeError(wire, 'expected ON or OFF');
    }
};

/** Maps vendor codes to labels, e.g. `{ '0': 'mbar', '1': 'Torr' }`. */
export function lookup(table: Readonly<Record<string, string>>): Codec<string> {
    return {
        encode: (label) => {
            const entry = Object.entries(table).find(([, value]) => value === label);
            if (!entry) throw new EncodeError(label, 'unknown label');
            return entry[0];
        },
        decode: (wire) => {
            const label = table[wire.trim()];
            if (label === undefined) throw new DecodeError(wire, 'unknown code');
            return label;
        }
    };
}

/**
 * Picks one field out of a separated payload, for instruments that answer
 * several quantities in one line (`23.0,C`).
 */
export function field<T>(separator: string | RegExp, index: number, inner: Codec<T>): Codec<T> {
    return {
        encode: (value) => inner.encode(value),
        decode: (wire) => {
            const parts = wire.split(separator);
            const part = parts[index];
            if (part === undefined) throw new DecodeError(wire, `missing field ${index}`);
            return inner.decode(part.trim());
        },
        compare: inner.compare
    };
}

/**
 * Status register as the list of labels whose bit is set. Keys are bit
 * masks, decimal or `0x` hex. Bits without a label are ignored on decode.
 */
export function flags(table: Readonly<Record<string, string>>): Codec<string[]> {
    const bits = Object.entries(table).map(([bit, label]): [number, string] => [Number(bit), label]);
    return {
        encode: (labels) => {
            let word = 0;
            for (const label of labels) {
                const entry = bits.find(([, name]) => name === label);
                if (!entry) throw new EncodeError(label, 'unknown flag');
                word |= entry[0];
            }
            return String(word);
        },
        decode: (wire) => {
            const word = integer.decode(wire);
            return bits.filter(([bit]) => (word & bit) !== 0).map(([, label]) => label);
        }
    };
}
