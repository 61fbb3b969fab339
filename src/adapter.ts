import { EventEmitter } from 'events';
import type { AnyCommand } from './command';
import { describeError } from './errors';
import type { Instrument, Operation } from './instrument';
import log from './logger';
import { PendingOperation, type Outcome } from './queue';
import type { Access } from './types';

const logger = log.scope('adapter');

export interface AdapterOptions {
    /** Logical name to tree path, e.g. `{ setpoint: 'pid.setpoint' }`. Unmapped names are paths. */
    mapping?: Record<string, string>;
    /** Extra attempts after a `TimeoutError`. Other failures are never retried. */
    retries?: number;
}

export interface SubmitOptions {
    onSettled?: (outcome: Outcome<unknown>) => void;
}

export interface SettledEvent {
    id: number;
    name: string;
    operation: Operation['type'];
    outcome: Outcome<unknown>;
}

export interface CommandInfo {
    name: string;
    path: string;
    kind: AnyCommand['kind'];
    access: Access;
    readable: boolean;
    writable: boolean;
    min: unknown;
    max: unknown;
    doc: string;
}

/**
 * Asynchronous boundary in front of one instrument. Callers submit work by
 * logical name and get a handle back at once; the instrument's queue runs
 * the work in submission order. Completion is reported through the handle's
 * promise, an optional per-call callback and the `settled` event, the last
 * two always on a later tick than the worker.
 */
export class InstrumentAdapter extends EventEmitter {
    private readonly mapping: Readonly<Record<string, string>>;
    private readonly retries: number;

    constructor(readonly instrument: Instrument, options: AdapterOptions = {}) {
        super();
        this.mapping = Object.freeze({ ...options.mapping });
        this.retries = Math.max(0, Math.floor(options.retries ?? 0));
    }

    pathOf(name: string): string {
        return Object.hasOwn(this.mapping, name) ? this.mapping[name] : name;
    }

    submit(name: string, operation: Operation, options: SubmitOptions = {}): PendingOperation<unknown> {
        let handle: PendingOperation<unknown>;
        try {
            const command = this.instrument.command(this.pathOf(name));
            handle = this.instrument.submit(command, operation, this.retries);
        } catch (error) {
            // Resolution failures travel on the handle too
            logger.warn(`${this.instrument.name}: ${operation.type} ${name} rejected: ${describeError(error)}`);
            handle = new PendingOperation<unknown>(`${operation.type} ${name}`, () => false);
            handle.settle({ status: 'rejected', error });
        }

        handle.onSettled((outcome) => {
            setImmediate(() => {
                try {
                    options.onSettled?.(outcome);
                } catch (error) {
                    logger.error(`${this.instrument.name}: onSettled callback for ${name} threw:`, error);
                }
                const event: SettledEvent = { id: handle.id, name, operation: operation.type, outcome };
                this.emit('settled', event);
            });
        });
        return handle;
    }

    get(name: string, options?: SubmitOptions): PendingOperation<unknown> {
        return this.submit(name, { type: 'get' }, options);
    }

    set(name: string, value: unknown, options?: SubmitOptions): PendingOperation<unknown> {
        return this.submit(name, { type: 'set', value }, options);
    }

    invoke(name: string, options?: SubmitOptions): PendingOperation<unknown> {
        return this.submit(name, { type: 'invoke' }, options);
    }

    describe(name: string): CommandInfo {
        const path = this.pathOf(name);
        const command = this.instrument.command(path);
        return {
            name,
            path,
            kind: command.kind,
            access: command.access,
            readable: command.readable,
            writable: command.writable,
            min: command.min,
            max: command.max,
            doc: command.doc
        };
    }

    /** Logical names from the mapping followed by every other command path. */
    names(): string[] {
        const mapped = new Set(Object.values(this.mapping));
        const paths = [...this.instrument.main.walk()].map(([path]) => path).filter(path => !mapped.has(path));
        return [...Object.keys(this.mapping), ...paths];
    }
}
