import { describe, expect, it } from 'vitest';
import { float, integer } from '../codecs';
import { Action, Command } from '../command';
import { DefinitionError, PathNotFoundError } from '../errors';
import { Subsystem, defineSubsystem, fromDeclaration } from '../subsystem';

function tree() {
    return defineSubsystem({
        a: defineSubsystem({
            b: defineSubsystem({
                c: new Command({ mnemonic: 'C', codec: float })
            }, { mnemonic: 'B', index: 2 })
        }, { mnemonic: 'A', node: 1, attributes: { index: 1, bank: 'x' } }),
        top: new Command({ read: 'TOP', codec: integer })
    }, { attributes: { bank: 'root' } });
}

describe('Subsystem', () => {
    it('resolves dotted paths to the same objects as property access', () => {
        const main = tree();
        expect(main.resolve('a.b.c')).toBe(main.a.b.c);
        expect(main.resolve(['a', 'b'])).toBe(main.a.b);
        expect(main.resolve('top')).toBe(main.top);
    });

    it('names the first missing segment', () => {
        expect.assertions(3);
        const main = tree();
        expect(() => main.resolve('a.x.c')).toThrow(PathNotFoundError);
        try {
            main.resolve('a.b.c.d');
        } catch (error) {
            expect(error).toBeInstanceOf(PathNotFoundError);
            expect(error).toMatchObject({ path: 'a.b.c.d', segment: 'd' });
        }
    });

    it('knows its position in the tree', () => {
        const main = tree();
        expect(main.a.b.path).toEqual(['a', 'b']);
        expect(main.a.b.root).toBe(main);
        expect(main.a.b.c.owner).toBe(main.a.b);
        expect(main.a.b.c.name).toBe('c');
        expect(main.path).toEqual([]);
    });

    it('merges addressing root first, nearest declaration wins', () => {
        const main = tree();
        expect(main.a.b.context()).toEqual({
            bank: 'x',
            index: 2,
            node: 1,
            mnemonic: 'B',
            name: 'b',
            path: 'a.b',
            mnemonicPath: 'A:B'
        });
    });

    it('walks every command depth first', () => {
        expect([...tree().walk()].map(([path]) => path)).toEqual(['top', 'a.b.c']);
    });

    it('rejects duplicate, reserved and invalid member names', () => {
        const subsystem = new Subsystem();
        subsystem.add('x', new Command({ mnemonic: 'X', codec: float }));
        expect(() => subsystem.add('x', new Subsystem())).toThrow('Duplicate member');
        expect(() => subsystem.add('a.b', new Subsystem())).toThrow('Invalid member name');
        expect(() => defineSubsystem({ resolve: new Subsystem() })).toThrow('reserved');
    });

    it('keeps ownership single and acyclic', () => {
        const command = new Command({ mnemonic: 'X', codec: float });
        const first = new Subsystem();
        first.add('x', command);
        expect(() => new Subsystem().add('x', command)).toThrow('already belongs');

        const parent = new Subsystem();
        const child = new Subsystem();
        parent.add('child', child);
        expect(() => new Subsystem().add('child', child)).toThrow('already has a parent');
        expect(() => child.add('parent', parent)).toThrow(DefinitionError);
    });

    it('refuses changes once sealed', () => {
        const main = tree();
        main.seal();
        expect(main.a.b.isSealed).toBe(true);
        expect(() => main.a.b.add('d', new Action({ mnemonic: 'D' }))).toThrow('sealed');
    });

    it('describes its commands', () => {
        const main = defineSubsystem({
            gain: new Command({ mnemonic: 'KP', codec: float, min: 0, max: 10, doc: 'Gain' }),
            reset: new Action({ mnemonic: 'RST' })
        });
        expect(main.describe().split('\n')).toEqual([
            'main',
            '  gain  parameter read-write [0, 10] Gain',
            '  reset action    write-only'
        ]);
    });
});

describe('fromDeclaration', () => {
    it('builds a tree from plain data', () => {
        const main = fromDeclaration({
            commands: { id: { read: '*IDN?' } },
            subsystems: {
                source: {
                    mnemonic: 'SOUR',
                    commands: {
                        level: { mnemonic: 'LEV', min: 0, max: 5, codec: float },
                        reset: { type: 'action', mnemonic: 'RST' }
                    }
                }
            }
        });
        const level = main.resolve('source.level');
        expect(level).toBeInstanceOf(Command);
        expect(main.resolve('source.reset')).toBeInstanceOf(Action);
        expect(main.resolve('id')).toMatchObject({ access: 'read-only', readMnemonic: '*IDN?' });
        expect(main.resolve('source')).toMatchObject({ addressing: { mnemonic: 'SOUR' } });
    });
});
