import { float } from '../codecs';
import { Action, Command } from '../command';
import { createInstrument } from '../instrument';
import { StatusCodeProtocol } from '../protocols/status';
import { defineSubsystem } from '../subsystem';
import { VirtualTransport } from '../transports/VirtualTransport';
import type { Transport } from '../transports/types';

/** Logical names a GUI binds to, mapped onto the virtual instrument's tree. */
export const virtualMapping = {
    setpoint: 'pid.setpoint',
    pidGain: 'pid.proportional',
    pidIntegral: 'pid.integralTime',
    pidDerivative: 'pid.derivativeTime',
    output: 'output.output',
    measure: 'input.measure'
};

const number = (mnemonic: string, doc: string, extra: { min?: number; max?: number } = {}) =>
    new Command({ mnemonic, codec: float, doc, ...extra });

export function createVirtualProtocol(timeoutMs = 1000): StatusCodeProtocol {
    return new StatusCodeProtocol({
        read: '{param[mnemonic]}?\n',
        write: '{param[mnemonic]} {val}\n',
        terminator: '\n',
        timeoutMs,
        errorMessages: {
            '20': 'Command not found',
            '25': 'Input out of limit',
            '26': 'Read only command',
            '27': 'Write only command'
        }
    });
}

/**
 * PID loop driving a first-order process, all simulated. Nothing changes
 * until a write or `transport.advance(seconds)`.
 */
export function createVirtualInstrument(transport: Transport = new VirtualTransport(), timeoutMs?: number) {
    return createInstrument({
        pid: defineSubsystem({
            setpoint: number('SP', 'Target value'),
            proportional: number('KP', 'Proportional gain', { min: 0 }),
            integralTime: number('TI', 'Integral time (s), 0 disables', { min: 0 }),
            derivativeTime: number('TD', 'Derivative time (s)', { min: 0 }),
            vmin: number('VMIN', 'Lower output limit'),
            vmax: number('VMAX', 'Upper output limit'),
            reset: new Action({ mnemonic: 'RST', doc: 'Clear the integral term' })
        }, { doc: 'Software PID controller' }),
        input: defineSubsystem({
            measure: new Command({ read: 'PV', codec: float, doc: 'Process value' })
        }, { doc: 'Measured process value' }),
        output: defineSubsystem({
            output: new Command({ read: 'OUT', codec: float, doc: 'Last controller output' })
        }, { doc: 'Controller output' })
    }, { name: transport.name, transport, protocol: createVirtualProtocol(timeoutMs) });
}
