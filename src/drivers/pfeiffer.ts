import { lookup, text, type Codec } from '../codecs';
import { Command } from '../command';
import { DecodeError, DeviceError } from '../errors';
import { createInstrument } from '../instrument';
import { EnqProtocol } from '../protocols/enq';
import { defineSubsystem } from '../subsystem';
import type { Transport } from '../transports/types';

const SENSOR_STATUS: Readonly<Record<string, string>> = {
    '1': 'Underrange',
    '2': 'Overrange',
    '3': 'Sensor error',
    '4': 'Sensor off',
    '5': 'No sensor',
    '6': 'Identification error'
};

/** `<status>,<value>` as sent for PRx; a non-zero sensor status is a device error. */
export const pressure: Codec<number> = {
    encode: (value) => value.toExponential(4).toUpperCase(),
    decode: (wire) => {
        const parts = wire.split(',').map(part => part.trim());
        if (parts.length !== 2 || !/^\d$/.test(parts[0])) {
            throw new DecodeError(wire, 'expected "<status>,<value>"');
        }
        const [status, value] = parts;
        if (status !== '0') {
            throw new DeviceError(status, SENSOR_STATUS[status] ?? 'unknown sensor status');
        }
        const reading = Number(value);
        if (value === '' || Number.isNaN(reading)) throw new DecodeError(wire, 'not a number');
        return reading;
    },
    compare: (a, b) => a - b
};

export function createMaxiGaugeProtocol(timeoutMs = 5000): EnqProtocol {
    return new EnqProtocol({
        read: '{param[mnemonic]}{subsys[channel]}\r\n',
        write: '{param[mnemonic]}{subsys[channel]},{val}\r\n',
        terminator: '\r\n',
        timeoutMs
    });
}

const gauge = (channel: number) => defineSubsystem({
    pressure: new Command({ read: 'PR', codec: pressure, doc: 'Pressure reading' })
}, { index: channel, attributes: { channel }, doc: `Gauge ${channel}` });

/** Pfeiffer TPG 256 A MaxiGauge, six gauge channels. */
export function createMaxiGauge(transport: Transport, timeoutMs?: number) {
    return createInstrument({
        gauge1: gauge(1),
        gauge2: gauge(2),
        gauge3: gauge(3),
        gauge4: gauge(4),
        gauge5: gauge(5),
        gauge6: gauge(6),
        controller: defineSubsystem({
            errors: new Command({ read: 'ERR', codec: text, doc: 'Error status words' }),
            unit: new Command({
                mnemonic: 'UNI',
                codec: lookup({ '0': 'mbar', '1': 'Torr', '2': 'Pascal' }),
                doc: 'Pressure unit'
            })
        })
    }, {
        name: 'maxigauge',
        transport,
        protocol: createMaxiGaugeProtocol(timeoutMs),
        // Controller-wide mnemonics carry no channel suffix
        addressing: { attributes: { channel: '' } }
    });
}
