import { float, integer } from '../codecs';
import { Command } from '../command';
import { createInstrument } from '../instrument';
import { XonXoffProtocol } from '../protocols/xon';
import { defineSubsystem } from '../subsystem';
import type { Transport } from '../transports/types';

export const WATLOW_ERRORS: Readonly<Record<string, string>> = {
    '1': 'Transmit buffer overflow',
    '2': 'Receive buffer overflow',
    '3': 'Framing error',
    '4': 'Overrun error',
    '5': 'Parity error',
    '6': 'Talking out of turn',
    '7': 'Invalid reply error',
    '8': 'Noise error',
    '20': 'Command not found',
    '21': 'Prompt not found',
    '22': 'Incomplete command line',
    '23': 'Invalid character',
    '24': 'Number of chars. overflow',
    '25': 'Input out of limit',
    '26': 'Read only command',
    '27': 'Write only command',
    '28': 'Prompt not active'
};

export function createWatlowProtocol(timeoutMs = 5000): XonXoffProtocol {
    return new XonXoffProtocol({
        read: '? {param[mnemonic]}\r',
        write: '= {param[mnemonic]} {val}\r',
        terminator: '\r',
        timeoutMs,
        errorQuery: '? ER2\r',
        errorMessages: WATLOW_ERRORS
    });
}

const pidMenu = (set: 1 | 2) => defineSubsystem({
    gain: new Command({ mnemonic: `PB${set}A`, codec: float, min: 0, doc: 'Proportional band' }),
    integral: new Command({ mnemonic: `IT${set}A`, codec: float, min: 0, max: 99.99, doc: 'Integral (repeats/min)' }),
    derivative: new Command({ mnemonic: `DE${set}A`, codec: float, min: 0, max: 9.99, doc: 'Derivative (min)' })
}, { doc: `Operation > PID ${set === 1 ? 'A' : 'B'}` });

/** Watlow Series 988 temperature controller over its XON/XOFF serial protocol. */
export function createWatlow988(transport: Transport, timeoutMs?: number) {
    return createInstrument({
        setpoint: new Command({ mnemonic: 'SP1', codec: float, doc: 'Set point 1' }),
        power: new Command({ read: 'PWR', codec: float, doc: 'Output power (%)' }),
        temperature: new Command({ read: 'C1', codec: float, doc: 'Input 1 process value' }),
        decimal: new Command({ mnemonic: 'DEC1', codec: integer, min: 0, max: 3, doc: 'Decimal places of input 1' }),
        operation: defineSubsystem({
            pidA: pidMenu(1),
            pidB: pidMenu(2)
        }, { doc: 'Operation menu' })
    }, { name: 'watlow988', transport, protocol: createWatlowProtocol(timeoutMs) });
}
