import { describe, expect, it, vi } from 'vitest';
import { float, integer, text, type Codec } from '../codecs';
import { Action, Command, parameter, type AnyCommand } from '../command';
import { AccessViolationError, DecodeError, DefinitionError, DeviceError, EncodeError, OutOfRangeError } from '../errors';

function fakeLink(answer = '0') {
    return {
        query: vi.fn(async (_command: AnyCommand): Promise<string> => answer),
        send: vi.fn(async (_command: AnyCommand, _wire: string): Promise<void> => undefined)
    };
}

describe('Command', () => {
    it('derives access from the mnemonics it has', () => {
        expect(new Command({ mnemonic: 'SP', codec: float }).access).toBe('read-write');
        expect(new Command({ read: 'PV', codec: float }).access).toBe('read-only');
        expect(new Command({ write: 'RST', codec: float }).access).toBe('write-only');
    });

    it('rejects inconsistent definitions', () => {
        expect(() => new Command({ codec: float })).toThrow(DefinitionError);
        expect(() => new Command({ read: 'PV', access: 'read-write', codec: float })).toThrow('needs a write mnemonic');
        expect(() => new Command({ mnemonic: 'SP', codec: float, min: 10, max: 0 })).toThrow(DefinitionError);
        const unordered: Codec<boolean> = { encode: String, decode: (wire) => wire === 'true' };
        expect(() => new Command({ mnemonic: 'EN', codec: unordered, min: false })).toThrow('ordering');
    });

    it('decodes what the link returns', async () => {
        const link = fakeLink('12.5');
        const command = new Command({ mnemonic: 'SP', codec: float });
        await expect(command.get(link)).resolves.toBe(12.5);
        expect(link.query).toHaveBeenCalledWith(command);
    });

    it('encodes the value it sends', async () => {
        const link = fakeLink();
        const command = new Command({ mnemonic: 'SP', codec: integer });
        await command.set(link, 7);
        expect(link.send).toHaveBeenCalledWith(command, '7');
    });

    it('never reaches the link on an access violation', async () => {
        const link = fakeLink();
        const readOnly = new Command({ read: 'PV', codec: float });
        const writeOnly = new Command({ write: 'RST', codec: float });
        await expect(readOnly.set(link, 1)).rejects.toBeInstanceOf(AccessViolationError);
        await expect(writeOnly.get(link)).rejects.toBeInstanceOf(AccessViolationError);
        expect(link.query).not.toHaveBeenCalled();
        expect(link.send).not.toHaveBeenCalled();
    });

    it('refuses out of range writes without sending', async () => {
        const link = fakeLink();
        const command = new Command({ mnemonic: 'SP', codec: float, min: 0, max: 100 });
        await expect(command.set(link, 101)).rejects.toBeInstanceOf(OutOfRangeError);
        await expect(command.set(link, -0.5)).rejects.toBeInstanceOf(OutOfRangeError);
        await expect(command.set(link, Number.NaN)).rejects.toMatchObject({ kind: 'RangeError' });
        expect(link.send).not.toHaveBeenCalled();
        await command.set(link, 100);
        expect(link.send).toHaveBeenCalledTimes(1);
    });

    it('returns out of range readings unchanged', async () => {
        const command = new Command({ mnemonic: 'SP', codec: float, min: 0, max: 100 });
        await expect(command.get(fakeLink('250'))).resolves.toBe(250);
    });

    it('wraps codec failures into decode errors', async () => {
        const throwing: Codec<number> = {
            encode: String,
            decode: () => {
                throw new Error('boom');
            }
        };
        const command = new Command({ read: 'X', codec: throwing });
        await expect(command.get(fakeLink('x'))).rejects.toBeInstanceOf(DecodeError);
    });

    it('lets device conditions raised by a codec through', async () => {
        const sensor: Codec<number> = {
            encode: String,
            decode: () => {
                throw new DeviceError('4', 'Sensor off');
            }
        };
        const command = new Command({ read: 'PR', codec: sensor });
        await expect(command.get(fakeLink('4,0'))).rejects.toBeInstanceOf(DeviceError);
    });

    it('belongs to one subsystem only', () => {
        const command = parameter({ mnemonic: 'ID' });
        expect(command.codec).toBe(text);
        expect(command.owner).toBeNull();
        expect(command.name).toBe('ID');
    });
});

describe('Action', () => {
    it('sends an empty value and has no read side', async () => {
        const link = fakeLink();
        const action = new Action({ mnemonic: 'RST' });
        expect(action.kind).toBe('action');
        expect(action.readMnemonic).toBeUndefined();
        await action.invoke(link);
        expect(link.send).toHaveBeenCalledWith(action, '');
        await expect(action.get(link)).rejects.toBeInstanceOf(AccessViolationError);
    });

    it('reports values the codec cannot encode as encode errors', async () => {
        const link = fakeLink();
        const strict: Codec<string> = {
            encode: (value) => {
                if (value === '') throw new Error('empty value');
                return value;
            },
            decode: (wire) => wire
        };
        const command = new Command({ mnemonic: 'NAME', codec: strict });
        await expect(command.set(link, '')).rejects.toMatchObject({ kind: 'EncodeError', message: 'Cannot encode : empty value' });
        await expect(command.set(link, '')).rejects.toBeInstanceOf(EncodeError);
        expect(link.send).not.toHaveBeenCalled();
    });
});
