import { Action, Command, type AnyCommand } from './command';
import type { Codec } from './codecs';
import { DefinitionError, PathNotFoundError } from './errors';
import type { Access, AttributeValue, Attributes } from './types';

export interface SubsystemAddressing {
    mnemonic?: string;
    index?: number;
    node?: number;
    /** Extra addressing values, visible to templates as `{subsys[<name>]}`. */
    attributes?: Attributes;
    doc?: string;
}

export type SubsystemMember = AnyCommand | Subsystem;

export type SubsystemMembers = Record<string, SubsystemMember>;

const MEMBER_NAME = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * A named grouping node of the command tree. Owns its commands and child
 * subsystems; the parent link is weak so ownership only ever runs top-down.
 */
export class Subsystem {
    readonly addressing: Readonly<SubsystemAddressing>;

    private readonly commandTable = new Map<string, AnyCommand>();
    private readonly childTable = new Map<string, Subsystem>();
    private parentRef: WeakRef<Subsystem> | null = null;
    private memberName = 'main';
    private sealed = false;

    constructor(addressing: SubsystemAddressing = {}) {
        this.addressing = Object.freeze({ ...addressing, attributes: Object.freeze({ ...addressing.attributes }) });
    }

    get name(): string {
        return this.memberName;
    }

    get parent(): Subsystem | null {
        return this.parentRef?.deref() ?? null;
    }

    get root(): Subsystem {
        let node: Subsystem = this;
        for (let parent = node.parent; parent; parent = node.parent) {
            node = parent;
        }
        return node;
    }

    /** Segments from the root (exclusive) down to this subsystem. */
    get path(): string[] {
        const segments: string[] = [];
        for (let node: Subsystem | null = this; node?.parent; node = node.parent) {
            segments.unshift(node.name);
        }
        return segments;
    }

    get commands(): ReadonlyMap<string, AnyCommand> {
        return this.commandTable;
    }

    get children(): ReadonlyMap<string, Subsystem> {
        return this.childTable;
    }

    get isSealed(): boolean {
        return this.sealed;
    }

    has(name: string): boolean {
        return this.commandTable.has(name) || this.childTable.has(name);
    }

    add(name: string, member: SubsystemMember): this {
        if (this.sealed) {
            throw new DefinitionError(`Subsystem ${this.describePath()} is sealed; cannot add ${name}`);
        }
        if (!MEMBER_NAME.test(name)) {
            throw new DefinitionError(`Invalid member name "${name}"`);
        }
        if (this.has(name)) {
            throw new DefinitionError(`Duplicate member "${name}" in ${this.describePath()}`);
        }

        if (member instanceof Subsystem) {
            if (member.parentRef) {
                throw new DefinitionError(`Subsystem ${member.name} already has a parent`);
            }
            for (let node: Subsystem | null = this; node; node = node.parent) {
                if (node === member) {
                    throw new DefinitionError(`Adding ${name} would create a cycle`);
                }
            }
            member.parentRef = new WeakRef(this);
            member.memberName = name;
            this.childTable.set(name, member);
        } else {
            member.attach(this, name);
            this.commandTable.set(name, member);
        }
        return this;
    }

    /** Structural changes are rejected once sealed; instruments seal their tree on construction. */
    seal(): void {
        this.sealed = true;
        for (const child of this.childTable.values()) {
            child.seal();
        }
    }

    resolve(path: string | readonly string[]): SubsystemMember {
        const segments = typeof path === 'string' ? path.split('.').filter(Boolean) : path;
        const label = segments.join('.');
        let current: SubsystemMember = this;
        for (const segment of segments) {
            if (!(current instanceof Subsystem)) {
                throw new PathNotFoundError(label, segment);
            }
            const next: SubsystemMember | undefined = current.childTable.get(segment) ?? current.commandTable.get(segment);
            if (!next) {
                throw new PathNotFoundError(label, segment);
            }
            current = next;
        }
        return current;
    }

    /** Own addressing attributes, without the ancestors'. */
    addressingAttributes(): Attributes {
        const own: Attributes = { ...this.addressing.attributes };
        const { mnemonic, index, node } = this.addressing;
        if (mnemonic !== undefined) own.mnemonic = mnemonic;
        if (index !== undefined) own.index = index;
        if (node !== undefined) own.node = node;
        return own;
    }

    /**
     * Template context of this subsystem: ancestors' attributes merged root
     * first so the nearest declaration wins, plus the names that locate it.
     */
    context(): Attributes {
        const chain: Subsystem[] = [];
        for (let node: Subsystem | null = this; node; node = node.parent) {
            chain.unshift(node);
        }
        const merged: Record<string, AttributeValue> = {};
        for (const node of chain) {
            Object.assign(merged, node.addressingAttributes());
        }
        merged.name = this.name;
        merged.path = this.path.join('.');
        merged.mnemonicPath = chain
            .map(node => node.addressing.mnemonic)
            .filter((mnemonic): mnemonic is string => Boolean(mnemonic))
            .join(':');
        return merged;
    }

    /** Every command below this node, depth-first, with its dotted path. */
    *walk(prefix: string[] = []): Generator<[string, AnyCommand]> {
        for (const [name, command] of this.commandTable) {
            yield [[...prefix, name].join('.'), command];
        }
        for (const [name, child] of this.childTable) {
            yield* child.walk([...prefix, name]);
        }
    }

    describe(indent = ''): string {
        const rows = [...this.commandTable].map(([name, command]) => {
            const bounds = command.min !== undefined || command.max !== undefined
                ? `[${String(command.min ?? '')}, ${String(command.max ?? '')}]`
                : '';
            return [name, command.kind, command.access, bounds, command.doc];
        });
        const widths = [0, 1, 2, 3].map(column => Math.max(0, ...rows.map(row => row[column].length)));
        const lines = [`${indent}${this.name}${this.addressing.doc ? ` - ${this.addressing.doc}` : ''}`];
        for (const row of rows) {
            const cells = row.slice(0, 4).map((cell, column) => cell.padEnd(widths[column]));
            lines.push(`${indent}  ${cells.join(' ')} ${row[4]}`.trimEnd());
        }
        for (const child of this.childTable.values()) {
            lines.push(child.describe(`${indent}  `));
        }
        return lines.join('\n');
    }

    private describePath(): string {
        return ['main', ...this.path].join('.');
    }
}

/**
 * Builds a subsystem whose members are also reachable as typed properties:
 * `defineSubsystem({ pid: defineSubsystem({ gain }) }).pid.gain` is the
 * command object, the same one `resolve('pid.gain')` returns.
 */
export function defineSubsystem<M extends SubsystemMembers>(members: M, addressing: SubsystemAddressing = {}): Subsystem & M {
    const subsystem = new Subsystem(addressing);
    for (const [name, member] of Object.entries(members)) {
        if (name in subsystem) {
            throw new DefinitionError(`Member name "${name}" is reserved`);
        }
        subsystem.add(name, member);
    }
    return Object.assign(subsystem, members);
}

export interface CommandDeclaration {
    type?: 'parameter' | 'action';
    mnemonic?: string;
    read?: string;
    write?: string;
    access?: Access;
    min?: number;
    max?: number;
    codec?: Codec<unknown>;
    attributes?: Attributes;
    doc?: string;
}

export interface SubsystemDeclaration extends SubsystemAddressing {
    commands?: Record<string, CommandDeclaration>;
    subsystems?: Record<string, SubsystemDeclaration>;
}

/**
 * Builds a tree from plain data, the form external generators (spreadsheets,
 * config files) produce. Commands without a codec exchange raw strings.
 */
export function fromDeclaration(declaration: SubsystemDeclaration, codecs: Record<string, Codec<unknown>> = {}): Subsystem {
    const { commands = {}, subsystems = {}, ...addressing } = declaration;
    const subsystem = new Subsystem(addressing);
    for (const [name, spec] of Object.entries(commands)) {
        if (spec.type === 'action') {
            const mnemonic = spec.mnemonic ?? spec.write;
            if (!mnemonic) throw new DefinitionError(`Action ${name} needs a mnemonic`);
            subsystem.add(name, new Action({ mnemonic, attributes: spec.attributes, doc: spec.doc }));
            continue;
        }
        const { type: _type, codec, ...options } = spec;
        subsystem.add(name, new Command<unknown>({ ...options, codec: codec ?? codecs[name] ?? rawText }));
    }
    for (const [name, child] of Object.entries(subsystems)) {
        subsystem.add(name, fromDeclaration(child, codecs));
    }
    return subsystem;
}

const rawText: Codec<unknown> = {
    encode: (value) => String(value),
    decode: (wire) => wire
};
