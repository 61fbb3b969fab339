import type { Codec } from './codecs';
import { text } from './codecs';
import {
    AccessViolationError,
    DecodeError,
    DefinitionError,
    EncodeError,
    OutOfRangeError,
    describeError,
    isInstrumentError
} from './errors';
import type { Subsystem } from './subsystem';
import type { Access, Attributes } from './types';

/**
 * What a command needs from its instrument to reach the wire. The instrument
 * supplies one that renders the framing context and talks to the transport.
 */
export interface CommandLink {
    query(command: AnyCommand): Promise<string>;
    send(command: AnyCommand, wire: string): Promise<void>;
}

export interface CommandOptions<T> {
    /** Mnemonic used for both directions unless `read` or `write` override it. */
    mnemonic?: string;
    read?: string;
    write?: string;
    access?: Access;
    min?: T;
    max?: T;
    codec: Codec<T>;
    /** Static values visible to framing templates as `{param[<name>]}`. */
    attributes?: Attributes;
    doc?: string;
}

export type CommandKind = 'parameter' | 'action';

export type AnyCommand = Command<unknown>;

function deriveAccess(read: string | undefined, write: string | undefined): Access {
    if (read !== undefined && write !== undefined) return 'read-write';
    return read !== undefined ? 'read-only' : 'write-only';
}

export class Command<T> {
    readonly kind: CommandKind = 'parameter';
    readonly readMnemonic: string | undefined;
    readonly writeMnemonic: string | undefined;
    readonly access: Access;
    readonly min: T | undefined;
    readonly max: T | undefined;
    readonly codec: Codec<T>;
    readonly attributes: Readonly<Attributes>;
    readonly doc: string;

    private ownerRef: WeakRef<Subsystem> | null = null;
    private memberName: string | null = null;

    constructor(options: CommandOptions<T>) {
        this.readMnemonic = options.read ?? options.mnemonic;
        this.writeMnemonic = options.write ?? options.mnemonic;
        if (this.readMnemonic === undefined && this.writeMnemonic === undefined) {
            throw new DefinitionError('A command needs a read or a write mnemonic');
        }
        this.access = options.access ?? deriveAccess(options.read ?? options.mnemonic, options.write ?? options.mnemonic);
        if (this.access !== 'write-only' && this.readMnemonic === undefined) {
            throw new DefinitionError(`A ${this.access} command needs a read mnemonic`);
        }
        if (this.access !== 'read-only' && this.writeMnemonic === undefined) {
            throw new DefinitionError(`A ${this.access} command needs a write mnemonic`);
        }

        this.codec = options.codec;
        this.min = options.min;
        this.max = options.max;
        if (this.min !== undefined || this.max !== undefined) {
            if (!this.codec.compare && typeof (this.min ?? this.max) !== 'number') {
                throw new DefinitionError('Bounds need a codec with an ordering');
            }
            if (this.min !== undefined && this.max !== undefined && this.compare(this.min, this.max) > 0) {
                throw new DefinitionError(`Lower bound ${String(this.min)} above upper bound ${String(this.max)}`);
            }
        }

        this.attributes = Object.freeze({ ...options.attributes });
        this.doc = options.doc ?? '';
    }

    get readable(): boolean {
        return this.access !== 'write-only';
    }

    get writable(): boolean {
        return this.access !== 'read-only';
    }

    get name(): string {
        return this.memberName ?? this.readMnemonic ?? this.writeMnemonic ?? '?';
    }

    get owner(): Subsystem | null {
        return this.ownerRef?.deref() ?? null;
    }

    /** Called by {@link Subsystem.add}; a command belongs to exactly one subsystem. */
    attach(owner: Subsystem, name: string): void {
        if (this.ownerRef) {
            throw new DefinitionError(`Command ${this.name} already belongs to a subsystem`);
        }
        this.ownerRef = new WeakRef(owner);
        this.memberName = name;
    }

    encode(value: T): string {
        try {
            return this.codec.encode(value);
        } catch (error) {
            if (isInstrumentError(error)) throw error;
            throw new EncodeError(value, describeError(error));
        }
    }

    decode(wire: string): T {
        try {
            return this.codec.decode(wire);
        } catch (error) {
            // Codecs may report device conditions carried in the payload
            if (isInstrumentError(error)) throw error;
            throw new DecodeError(wire, describeError(error));
        }
    }

    /** Throws {@link OutOfRangeError} when `value` falls outside the declared bounds. */
    checkBounds(value: T): void {
        // NaN compares false both ways, so test for "inside" rather than "outside"
        const aboveMin = this.min === undefined || this.compare(value, this.min) >= 0;
        const belowMax = this.max === undefined || this.compare(value, this.max) <= 0;
        if (!aboveMin || !belowMax) {
            throw new OutOfRangeError(value, this.min, this.max);
        }
    }

    /**
     * Reads the value from hardware. Decoded values outside the bounds are
     * returned unchanged: bounds only gate writes.
     */
    async get(link: CommandLink): Promise<T> {
        if (!this.readable) throw new AccessViolationError(this.name, 'read');
        const payload = await link.query(this);
        return this.decode(payload);
    }

    async set(link: CommandLink, value: T): Promise<void> {
        if (!this.writable) throw new AccessViolationError(this.name, 'write');
        this.checkBounds(value);
        await link.send(this, this.encode(value));
    }

    private compare(a: T, b: T): number {
        if (this.codec.compare) return this.codec.compare(a, b);
        if (typeof a === 'number' && typeof b === 'number') return a - b;
        return Number.NaN;
    }
}

const trigger: Codec<void> = {
    encode: () => '',
    decode: () => undefined
};

/** Fire-and-forget command: a write-only parameter whose wire value is empty. */
export class Action extends Command<void> {
    override readonly kind: CommandKind = 'action';

    constructor(options: { mnemonic: string; attributes?: Attributes; doc?: string }) {
        super({
            write: options.mnemonic,
            access: 'write-only',
            codec: trigger,
            attributes: options.attributes,
            doc: options.doc
        });
    }

    invoke(link: CommandLink): Promise<void> {
        return this.set(link, undefined);
    }
}

export function parameter(options: Omit<CommandOptions<string>, 'codec'>): Command<string> {
    return new Command({ ...options, codec: text });
}
