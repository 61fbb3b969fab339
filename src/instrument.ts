import { Action, Command, type AnyCommand, type CommandLink } from './command';
import { DefinitionError, PathNotFoundError, TimeoutError } from './errors';
import log from './logger';
import type { Direction, Protocol } from './protocols/protocol';
import { OperationQueue, type PendingOperation } from './queue';
import {
    Subsystem,
    defineSubsystem,
    type SubsystemAddressing,
    type SubsystemMember,
    type SubsystemMembers
} from './subsystem';
import type { Transport } from './transports/types';
import type { Attributes, FramingContext } from './types';

const logger = log.scope('instrument');

export interface InstrumentOptions<S extends Subsystem = Subsystem> {
    name?: string;
    transport: Transport;
    protocol: Protocol;
    main: S;
    /** Instrument-wide addressing, visible to templates as `{instr[<name>]}`. */
    attributes?: Attributes;
}

export type Operation =
    | { type: 'get' }
    | { type: 'set'; value: unknown }
    | { type: 'invoke' };

const printable = (data: Buffer): string => JSON.stringify(data.toString('latin1'));

export class Instrument<S extends Subsystem = Subsystem> {
    readonly name: string;
    readonly transport: Transport;
    readonly protocol: Protocol;
    readonly main: S;
    readonly attributes: Readonly<Attributes>;
    readonly queue: OperationQueue;

    private readonly link: CommandLink;

    constructor(options: InstrumentOptions<S>) {
        this.name = options.name ?? options.transport.name;
        this.transport = options.transport;
        this.protocol = options.protocol;
        this.main = options.main;
        this.attributes = Object.freeze({ ...options.attributes });
        this.queue = new OperationQueue(this.name);

        if (this.main.parent) {
            throw new DefinitionError(`Subsystem ${this.main.name} is not a root subsystem`);
        }
        this.main.seal();
        for (const [path, command] of this.main.walk()) {
            try {
                if (command.readable) this.protocol.validate(this.contextFor(command, 'read'), 'read');
                if (command.writable) this.protocol.validate(this.contextFor(command, 'write'), 'write');
            } catch (error) {
                if (error instanceof DefinitionError) {
                    throw new DefinitionError(`${this.name}: command ${path}: ${error.message}`);
                }
                throw error;
            }
        }

        this.link = {
            query: async (command) => {
                this.dropStaleInput();
                logger.debug(`${this.name}: read ${command.name}`);
                const payload = await this.protocol.query(this.transport, this.contextFor(command, 'read'));
                logger.debug(`${this.name}: ${command.name} <- ${JSON.stringify(payload)}`);
                return payload;
            },
            send: async (command, wire) => {
                this.dropStaleInput();
                logger.debug(`${this.name}: write ${command.name} ${JSON.stringify(wire)}`);
                await this.protocol.send(this.transport, this.contextFor(command, 'write'), wire);
            }
        };
    }

    async open(): Promise<void> {
        await this.transport.open();
        logger.info(`${this.name}: opened over ${this.transport.name} (${this.protocol.id})`);
    }

    async close(): Promise<void> {
        await this.queue.idle();
        await this.transport.close();
        logger.info(`${this.name}: closed`);
    }

    /** Dotted path lookup; a leading `main.` is accepted and ignored. */
    resolve(path: string): SubsystemMember {
        const segments = path.split('.').filter(Boolean);
        if (segments[0] === 'main' && !this.main.has('main')) segments.shift();
        return this.main.resolve(segments);
    }

    command(path: string): AnyCommand {
        const member = this.resolve(path);
        if (!(member instanceof Command)) {
            // the path ends on a subsystem, so the command segment is what is missing
            throw new PathNotFoundError(path, `${path.split('.').pop() ?? path}.<command>`);
        }
        return member;
    }

    /** `param[mnemonic]` is the mnemonic of the given direction. */
    contextFor(command: AnyCommand, direction: Direction): FramingContext {
        const owner = command.owner;
        if (!owner || owner.root !== this.main) {
            throw new DefinitionError(`Command ${command.name} does not belong to instrument ${this.name}`);
        }
        const mnemonic = (direction === 'read' ? command.readMnemonic : command.writeMnemonic) ?? '';
        const param: Attributes = { mnemonic, name: command.name, ...command.attributes };
        if (command.readMnemonic !== undefined) param.read = command.readMnemonic;
        if (command.writeMnemonic !== undefined) param.write = command.writeMnemonic;
        return {
            param,
            subsys: owner.context(),
            instr: { ...this.attributes, name: this.name },
            protocol: this.protocol.attributes
        };
    }

    get<T>(command: Command<T>): PendingOperation<T>;
    get(path: string): PendingOperation<unknown>;
    get(target: AnyCommand | string): PendingOperation<unknown> {
        return this.submit(this.target(target), { type: 'get' });
    }

    set<T>(command: Command<T>, value: T): PendingOperation<void>;
    set(path: string, value: unknown): PendingOperation<void>;
    set(target: AnyCommand | string, value: unknown): PendingOperation<unknown> {
        return this.submit(this.target(target), { type: 'set', value });
    }

    invoke(target: Action | string): PendingOperation<void>;
    invoke(target: Action | string): PendingOperation<unknown> {
        return this.submit(this.target(target), { type: 'invoke' });
    }

    /**
     * Queues one operation. `retries` extra attempts are made, inside the same
     * queue slot, when an attempt fails with {@link TimeoutError}.
     */
    submit(command: AnyCommand, operation: Operation, retries = 0): PendingOperation<unknown> {
        const label = `${operation.type} ${command.name}`;
        let run: () => Promise<unknown>;
        switch (operation.type) {
            case 'get':
                run = () => command.get(this.link);
                break;
            case 'set':
                run = () => command.set(this.link, operation.value);
                break;
            case 'invoke':
                if (!(command instanceof Action)) {
                    throw new DefinitionError(`Command ${command.name} is not an action`);
                }
                run = () => command.invoke(this.link);
                break;
        }
        return this.queue.enqueue(label, async () => {
            for (let attempt = 0; ; attempt++) {
                try {
                    return await run();
                } catch (error) {
                    if (!(error instanceof TimeoutError) || attempt >= retries) throw error;
                    logger.warn(`${this.name}: ${label} timed out, retry ${attempt + 1}/${retries}`);
                }
            }
        });
    }

    describe(): string {
        return `${this.name} (${this.protocol.id} over ${this.transport.name})\n${this.main.describe('  ')}`;
    }

    private target(target: AnyCommand | string): AnyCommand {
        return typeof target === 'string' ? this.command(target) : target;
    }

    private dropStaleInput(): void {
        if (this.transport.available() === 0) return;
        const stale = this.transport.discardInput();
        logger.warn(`${this.name}: discarded ${stale.length} stale byte(s) ${printable(stale)}`);
    }
}

export interface CreateInstrumentOptions extends Omit<InstrumentOptions, 'main'> {
    /** Addressing of the root subsystem. */
    addressing?: SubsystemAddressing;
}

/**
 * Builds an instrument whose tree is also reachable as typed properties:
 * `createInstrument({ pid: defineSubsystem({ setpoint }) }, options).pid.setpoint`
 * is the command `resolve('pid.setpoint')` returns.
 */
export function createInstrument<M extends SubsystemMembers>(
    members: M,
    options: CreateInstrumentOptions
): Instrument<Subsystem & M> & M {
    const { addressing, ...rest } = options;
    const instrument = new Instrument({ ...rest, main: defineSubsystem(members, addressing) });
    for (const name of Object.keys(members)) {
        if (name in instrument) {
            throw new DefinitionError(`Member name "${name}" is reserved on an instrument`);
        }
    }
    return Object.assign(instrument, members);
}
