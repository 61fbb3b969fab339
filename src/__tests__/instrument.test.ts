import { describe, expect, it } from 'vitest';
import { float, integer } from '../codecs';
import { Action, Command } from '../command';
import { AccessViolationError, DefinitionError, OutOfRangeError, PathNotFoundError } from '../errors';
import { Instrument, createInstrument } from '../instrument';
import { LineProtocol } from '../protocols/line';
import { defineSubsystem } from '../subsystem';
import { BufferedTransport } from '../transports/BufferedTransport';
import { TesterTransport, type CannedExchange } from '../transports/TesterTransport';

const lineProtocol = () => new LineProtocol({
    read: '{subsys[mnemonicPath]}:{param[mnemonic]}?\n',
    write: '{subsys[mnemonicPath]}:{param[mnemonic]} {val}\n'
});

function bench(...exchanges: CannedExchange[]) {
    const transport = new TesterTransport(exchanges);
    const instrument = createInstrument({
        a: defineSubsystem({
            b: defineSubsystem({
                c: new Command({ mnemonic: 'C', codec: float, min: 0, max: 50 })
            }, { mnemonic: 'B' })
        }, { mnemonic: 'A' }),
        level: new Command({ read: 'LEV', codec: integer }),
        arm: new Action({ mnemonic: 'ARM' })
    }, { name: 'bench', transport, protocol: lineProtocol(), addressing: { mnemonic: 'SYS' } });
    return { instrument, transport };
}

/** Holds every write until {@link letThrough}, then answers it. */
class GatedTransport extends BufferedTransport {
    readonly name = 'gated';
    private pending: (() => void) | null = null;

    constructor(private readonly answer: string) {
        super();
    }

    async open(): Promise<void> {}

    async close(): Promise<void> {}

    isOpen(): boolean {
        return true;
    }

    write(_data: Buffer): Promise<void> {
        return new Promise(resolve => {
            this.pending = () => {
                this.receive(Buffer.from(this.answer, 'latin1'));
                resolve();
            };
        });
    }

    letThrough(): void {
        this.pending?.();
        this.pending = null;
    }
}

describe('Instrument', () => {
    it('resolves nested commands the same way as property access', () => {
        const { instrument } = bench();
        expect(instrument.resolve('a.b.c')).toBe(instrument.a.b.c);
        expect(instrument.resolve('main.a.b.c')).toBe(instrument.a.b.c);
        expect(instrument.main.a.b.c).toBe(instrument.a.b.c);
        expect(instrument.command('level')).toBe(instrument.level);
    });

    it('reports paths that do not lead to a command', () => {
        const { instrument } = bench();
        expect(() => instrument.resolve('a.x')).toThrow(PathNotFoundError);
        expect(() => instrument.command('a.b')).toThrow(PathNotFoundError);
    });

    it('renders the tree addressing into the frame', async () => {
        const { instrument, transport } = bench(['SYS:A:B:C?\n', '12.5\n'], ['SYS:A:B:C 20\n', '']);
        await expect(instrument.get(instrument.a.b.c).result).resolves.toBe(12.5);
        await instrument.set('a.b.c', 20).result;
        transport.assertConsumed();
    });

    it('exposes the framing context of a command', () => {
        const { instrument } = bench();
        expect(instrument.contextFor(instrument.a.b.c, 'read')).toEqual({
            param: { mnemonic: 'C', name: 'c', read: 'C', write: 'C' },
            subsys: { mnemonic: 'B', name: 'b', path: 'a.b', mnemonicPath: 'SYS:A:B' },
            instr: { name: 'bench' },
            protocol: {}
        });
        const stranger = new Command({ mnemonic: 'X', codec: float });
        defineSubsystem({ stranger });
        expect(() => instrument.contextFor(stranger, 'read')).toThrow(DefinitionError);
    });

    it('fails access and range checks without touching the transport', async () => {
        const { instrument, transport } = bench();
        await expect(instrument.set('level', 3).result).rejects.toBeInstanceOf(AccessViolationError);
        await expect(instrument.get('arm').result).rejects.toBeInstanceOf(AccessViolationError);
        await expect(instrument.set(instrument.a.b.c, 51).result).rejects.toBeInstanceOf(OutOfRangeError);
        expect(transport.written).toEqual([]);
    });

    it('invokes actions only', async () => {
        const { instrument, transport } = bench(['SYS:ARM \n', '']);
        await instrument.invoke(instrument.arm).result;
        expect(transport.written.map(data => data.toString('latin1'))).toEqual(['SYS:ARM \n']);
        expect(() => instrument.invoke('level')).toThrow('not an action');
    });

    it('drops input left over from an earlier exchange', async () => {
        const { instrument } = bench(['SYS:A:B:C 1\n', 'late\n'], ['SYS:LEV?\n', '7\n']);
        await instrument.set(instrument.a.b.c, 1).result;
        await expect(instrument.get(instrument.level).result).resolves.toBe(7);
    });

    it('checks every template against the tree when built', () => {
        const transport = new TesterTransport([]);
        const protocol = new LineProtocol({ read: '{subsys[channel]}{param[mnemonic]}?\n' });
        expect(() => new Instrument({
            transport,
            protocol,
            main: defineSubsystem({ gauge: defineSubsystem({ pressure: new Command({ read: 'PR', codec: float }) }) })
        })).toThrow('command gauge.pressure');
        expect(() => new Instrument({
            transport,
            protocol,
            main: defineSubsystem({ reset: new Action({ mnemonic: 'RST' }) })
        })).toThrow('no write template');
    });

    it('seals its tree and guards its own names', () => {
        const { instrument } = bench();
        expect(instrument.main.isSealed).toBe(true);
        expect(() => instrument.main.add('extra', new Action({ mnemonic: 'X' }))).toThrow('sealed');
        expect(() => createInstrument({ queue: new Action({ mnemonic: 'Q' }) }, {
            transport: new TesterTransport([]),
            protocol: lineProtocol()
        })).toThrow('reserved on an instrument');
    });

    it('describes the tree', () => {
        const { instrument } = bench();
        expect(instrument.describe().split('\n')[0]).toBe('bench (line over tester)');
    });

    it('runs the queues of separate instruments independently', async () => {
        const gate = new GatedTransport('7\n');
        const members = () => ({ level: new Command({ read: 'LEV', codec: integer }) });
        const held = createInstrument(members(), { name: 'held', transport: gate, protocol: lineProtocol() });
        const free = createInstrument(members(), {
            name: 'free',
            transport: new TesterTransport([[':LEV?\n', '3\n']]),
            protocol: lineProtocol()
        });

        const slow = held.get(held.level);
        await expect(free.get(free.level).result).resolves.toBe(3);
        expect(slow.state).toBe('running');

        gate.letThrough();
        await expect(slow.result).resolves.toBe(7);
    });
});
