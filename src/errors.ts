export type InstrumentErrorKind =
    | 'AccessViolation'
    | 'RangeError'
    | 'PathNotFound'
    | 'TimeoutError'
    | 'DeviceError'
    | 'DecodeError'
    | 'EncodeError'
    | 'DefinitionError'
    | 'TesterMismatch'
    | 'Cancelled';

/**
 * Base class of every error raised by the command, protocol and transport layers.
 * `kind` lets callers branch without importing each subclass.
 */
export class InstrumentError extends Error {
    readonly kind: InstrumentErrorKind;

    constructor(kind: InstrumentErrorKind, message: string) {
        super(message);
        this.kind = kind;
        this.name = new.target.name;
    }
}

export class AccessViolationError extends InstrumentError {
    constructor(readonly command: string, readonly attempted: 'read' | 'write') {
        super('AccessViolation', `Command ${command} is ${attempted === 'read' ? 'write-only' : 'read-only'}`);
    }
}

export class OutOfRangeError extends InstrumentError {
    constructor(readonly value: unknown, readonly min: unknown, readonly max: unknown) {
        super('RangeError', `Value ${String(value)} outside [${String(min ?? '-inf')}, ${String(max ?? '+inf')}]`);
    }
}

export class PathNotFoundError extends InstrumentError {
    constructor(readonly path: string, readonly segment: string) {
        super('PathNotFound', `No member "${segment}" while resolving "${path}"`);
    }
}

export class TimeoutError extends InstrumentError {
    constructor(readonly waitingFor: string, readonly timeoutMs: number) {
        super('TimeoutError', `Timed out after ${timeoutMs}ms waiting for ${waitingFor}`);
    }
}

export class DeviceError extends InstrumentError {
    constructor(readonly code: string, detail?: string) {
        super('DeviceError', detail ? `Device reported error ${code}: ${detail}` : `Device reported error ${code}`);
    }
}

export class DecodeError extends InstrumentError {
    constructor(readonly payload: string, reason: string) {
        super('DecodeError', `Cannot decode ${JSON.stringify(payload)}: ${reason}`);
    }
}

export class EncodeError extends InstrumentError {
    constructor(readonly value: unknown, reason: string) {
        super('EncodeError', `Cannot encode ${String(value)}: ${reason}`);
    }
}

export class DefinitionError extends InstrumentError {
    constructor(message: string) {
        super('DefinitionError', message);
    }
}

export class TesterMismatchError extends InstrumentError {
    constructor(readonly expected: Buffer | null, readonly actual: Buffer) {
        super(
            'TesterMismatch',
            expected
                ? `Expected write ${JSON.stringify(expected.toString('latin1'))}, got ${JSON.stringify(actual.toString('latin1'))}`
                : `Unexpected write ${JSON.stringify(actual.toString('latin1'))}: canned exchanges exhausted`
        );
    }
}

export class OperationCancelledError extends InstrumentError {
    constructor(readonly label: string) {
        super('Cancelled', `Operation ${label} was cancelled before it started`);
    }
}

export function isInstrumentError(error: unknown): error is InstrumentError {
    return error instanceof InstrumentError;
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
