import { DefinitionError, TimeoutError } from '../errors';
import type { Transport } from '../transports/types';
import type { FramingContext } from '../types';
import { Protocol, type Direction } from './protocol';

/** One in-process endpoint. Values cross as the codec's wire strings. */
export interface Accessor {
    read?(): unknown;
    write?(wire: string): unknown;
}

export type Accessors = Readonly<Record<string, Accessor>>;

export interface CallProtocolOptions {
    /** Accessors keyed by command mnemonic. */
    accessors: Accessors;
    /** Budget for accessors that return a promise. */
    timeoutMs?: number;
}

/**
 * Exposes an object's properties as accessors. A write converts the wire
 * string back to the type the property currently holds.
 */
export function propertyAccessors<O extends object>(target: O, keys: ReadonlyArray<keyof O & string>): Accessors {
    return Object.fromEntries(keys.map((key): [string, Accessor] => [key, {
        read: () => Reflect.get(target, key),
        write: (wire) => {
            const current: unknown = Reflect.get(target, key);
            const value = typeof current === 'number' ? Number(wire)
                : typeof current === 'boolean' ? wire === 'true' || wire === '1' || wire.toUpperCase() === 'ON'
                    : wire;
            Reflect.set(target, key, value);
        }
    }]));
}

/**
 * No framing at all: a command's mnemonic names a function pair or a
 * property, and the transport is never touched. For instruments driven
 * through a vendor library or a simulation living in the same process.
 */
export class CallProtocol extends Protocol {
    readonly id = 'call';
    private readonly accessors: Accessors;

    constructor(options: CallProtocolOptions) {
        super({ timeoutMs: options.timeoutMs });
        this.accessors = options.accessors;
    }

    override validate(context: FramingContext, direction: Direction): void {
        this.accessorFor(context, direction);
    }

    override async query(_transport: Transport, context: FramingContext): Promise<string> {
        const accessor = this.accessorFor(context, 'read');
        if (!accessor.read) throw new DefinitionError(`No read accessor for ${String(context.param.mnemonic)}`);
        const value = await this.withinBudget(accessor.read(), String(context.param.mnemonic));
        return String(value);
    }

    override async send(_transport: Transport, context: FramingContext, wire: string): Promise<void> {
        const accessor = this.accessorFor(context, 'write');
        if (!accessor.write) throw new DefinitionError(`No write accessor for ${String(context.param.mnemonic)}`);
        await this.withinBudget(accessor.write(wire), String(context.param.mnemonic));
    }

    private accessorFor(context: FramingContext, direction: Direction): Accessor {
        const mnemonic = String(context.param.mnemonic);
        const accessor = Object.hasOwn(this.accessors, mnemonic) ? this.accessors[mnemonic] : undefined;
        if (!accessor || !accessor[direction]) {
            throw new DefinitionError(`No ${direction} accessor for ${mnemonic}`);
        }
        return accessor;
    }

    private withinBudget(result: unknown, mnemonic: string): Promise<unknown> {
        if (!(result instanceof Promise)) return Promise.resolve(result);
        return new Promise((resolve, reject) => {
            const timer = setTimeout(() => reject(new TimeoutError(`accessor ${mnemonic}`, this.timeoutMs)), this.timeoutMs);
            result.then(
                (value: unknown) => {
                    clearTimeout(timer);
                    resolve(value);
                },
                (error: unknown) => {
                    clearTimeout(timer);
                    reject(error);
                }
            );
        });
    }
}
