import { field, float, text } from '../codecs';
import { Action, Command } from '../command';
import { createInstrument } from '../instrument';
import { StatusCodeProtocol } from '../protocols/status';
import { defineSubsystem } from '../subsystem';
import type { Transport } from '../transports/types';

// Key codes of the SF (set function) command
const BUTTONS: Record<string, number> = {
    blue: 10,
    hold: 11,
    minMax: 12,
    rel: 13,
    upArrow: 14,
    shift: 15,
    hz: 16,
    range: 17,
    downArrow: 18,
    backlight: 19,
    calibration: 20,
    autoHold: 21,
    fastMinMax: 22,
    logging: 23,
    cancel: 27,
    wakeUp: 28,
    setup: 29,
    save: 30
};

export function createFlukeProtocol(timeoutMs = 1000): StatusCodeProtocol {
    return new StatusCodeProtocol({
        read: '{param[mnemonic]}\r',
        write: '{param[mnemonic]}\r',
        terminator: '\r',
        timeoutMs,
        errorMessages: { '1': 'Command error' }
    });
}

/**
 * Fluke 187/189 and 87-IV/89-IV multimeters. The meter acknowledges every
 * command with `0` (or `1` on error); `QM` answers `<value>,<unit>`.
 */
export function createFluke18x(transport: Transport, timeoutMs?: number) {
    const buttons = Object.fromEntries(
        Object.entries(BUTTONS).map(([name, code]) => [name, new Action({ mnemonic: `SF ${code}`, doc: `Press ${name}` })])
    );
    return createInstrument({
        identification: new Command({ read: 'ID', codec: text, doc: 'Model, serial number and software version' }),
        measure: new Command({ read: 'QM', codec: field(',', 0, float), doc: 'Displayed value' }),
        unit: new Command({ read: 'QM', codec: field(',', 1, text), doc: 'Unit of the displayed value' }),
        defaultSetup: new Action({ mnemonic: 'DS' }),
        reset: new Action({ mnemonic: 'RI' }),
        buttons: defineSubsystem(buttons, { doc: 'Front panel key presses' })
    }, { name: 'fluke18x', transport, protocol: createFlukeProtocol(timeoutMs) });
}
