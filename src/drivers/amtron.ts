import { flags, integer, scaled } from '../codecs';
import { Command, type CommandOptions } from '../command';
import { createInstrument } from '../instrument';
import { EchoStatusProtocol } from '../protocols/echo';
import { defineSubsystem } from '../subsystem';
import type { Transport } from '../transports/types';
import FLAGS from './amtron-flags.json';

export function createAmtronProtocol(timeoutMs = 3000): EchoStatusProtocol {
    return new EchoStatusProtocol({
        read: ':r {subsys[index]:02X}{param[register]:02X}\r',
        write: ':w {subsys[index]:02X}{param[register]:02X} {val}\r',
        terminator: '\r',
        timeoutMs
    });
}

/** A register of the addressed subsystem; the mnemonic is its hex code. */
function register<T>(code: number, options: Omit<CommandOptions<T>, 'mnemonic' | 'read' | 'write' | 'attributes'>): Command<T> {
    const mnemonic = code.toString(16).toUpperCase().padStart(2, '0');
    const access = options.access ?? 'read-only';
    return new Command({
        ...options,
        access,
        read: access === 'write-only' ? undefined : mnemonic,
        write: access === 'read-only' ? undefined : mnemonic,
        attributes: { register: code }
    });
}

const tenths = scaled(0.1);

/** Amtron CS400 laser controller; every subsystem is a register bank selected by `index`. */
export function createAmtronCS400(transport: Transport, timeoutMs?: number) {
    return createInstrument({
        system: defineSubsystem({
            errors: register(0x01, { codec: flags(FLAGS.systemErrors) }),
            warnings: register(0x03, { codec: flags(FLAGS.systemWarnings) }),
            configuration: register(0x05, { codec: integer, access: 'read-write', min: 0, max: 0x8001 }),
            firmware: register(0x07, { codec: scaled(0.001), doc: 'Firmware version' }),
            operationMode: register(0x0a, { codec: integer, access: 'read-write', min: 0, max: 4 }),
            deviceState: register(0x0e, { codec: integer }),
            timeoutLaserOn: register(0x14, { codec: tenths, access: 'read-write', min: 0, max: 300, doc: 'Seconds' }),
            operationTime: register(0x1a, { codec: integer, doc: 'Hours' })
        }, { index: 0x00, doc: 'Superordinated functions' }),
        control: defineSubsystem({
            controlMode: register(0x04, { codec: integer, access: 'read-write', min: 1, max: 4 }),
            setTotalCurrent: register(0x05, { codec: tenths, access: 'read-write', min: 0, max: 320, doc: 'A' }),
            totalCurrent: register(0x06, { codec: tenths, doc: 'A' }),
            setTotalPower: register(0x07, { codec: tenths, access: 'read-write', min: 0, max: 4000, doc: 'W' }),
            totalPowerMeasured: register(0x08, { codec: tenths, doc: 'W' }),
            totalPowerCalculated: register(0x0a, { codec: tenths, doc: 'W' }),
            pulseDuration: register(0x1a, { codec: integer, access: 'read-write', min: 10, max: 65000 }),
            pulsePause: register(0x1b, { codec: integer, access: 'read-write', min: 0, max: 65000 })
        }, { index: 0x02, doc: 'Power control' }),
        laser: defineSubsystem({
            errors: register(0x01, { codec: flags(FLAGS.laserErrors) }),
            warnings: register(0x03, { codec: flags(FLAGS.laserWarnings) }),
            onTime: register(0x09, { codec: integer }),
            temperature: register(0x0c, { codec: tenths, doc: 'degC' }),
            power: register(0x0d, { codec: tenths, doc: 'W' }),
            headHumidity: register(0x0f, { codec: tenths })
        }, { index: 0x05, doc: 'Laser head' }),
        interface: defineSubsystem({
            errors: register(0x01, { codec: flags(FLAGS.interfaceErrors) }),
            pilotBeamIntensity: register(0x0b, { codec: integer, access: 'read-write', min: 1, max: 10 })
        }, { index: 0x06, doc: 'Interface configuration and states' }),
        power: defineSubsystem({
            errors: register(0x01, { codec: flags(FLAGS.powerErrors) }),
            warnings: register(0x03, { codec: flags(FLAGS.powerWarnings) }),
            current: register(0x0a, { codec: tenths, doc: 'A' }),
            voltage: register(0x0b, { codec: tenths, doc: 'V' }),
            power: register(0x0c, { codec: tenths, doc: 'W' })
        }, { index: 0x0a, doc: 'Power unit' })
    }, { name: 'cs400', transport, protocol: createAmtronProtocol(timeoutMs) });
}
