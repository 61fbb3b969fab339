import fs from 'fs';
import os from 'os';
import path from 'path';
import log from './logger';
import { SerialTransport } from './transports/SerialTransport';
import { VirtualTransport } from './transports/VirtualTransport';
import type { Parity, Transport } from './transports/types';

const logger = log.scope('config');

const CONFIG_FILE = 'transport-config.json';

export interface TransportConfig {
    type: 'serial' | 'virtual';
    path?: string; // Serial path, e.g. /dev/ttyUSB0 or COM3
    baudRate: number;
    parity: Parity;
    dataBits: 5 | 6 | 7 | 8;
    stopBits: 1 | 2;
    timeoutMs: number; // Per-read budget handed to the protocol
}

export const DEFAULT_TRANSPORT_CONFIG: TransportConfig = {
    type: 'virtual',
    baudRate: 9600,
    parity: 'none',
    dataBits: 8,
    stopBits: 1,
    timeoutMs: 1000
};

const PARITIES: readonly Parity[] = ['none', 'even', 'odd', 'mark', 'space'];

export function getConfigDir(): string {
    return process.env.BENCHWIRE_CONFIG_DIR || path.join(os.homedir(), '.benchwire');
}

export function getConfigPath(): string {
    return path.join(getConfigDir(), CONFIG_FILE);
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/** Keeps the stored keys that have the right shape; anything else falls back to the default. */
function pickStored(stored: unknown): Partial<TransportConfig> {
    if (!isRecord(stored)) {
        logger.warn('Ignoring transport config that is not an object');
        return {};
    }
    const picked: Partial<TransportConfig> = {};
    const { type, path: portPath, baudRate, parity, dataBits, stopBits, timeoutMs } = stored;
    if (type === 'serial' || type === 'virtual') picked.type = type;
    if (typeof portPath === 'string') picked.path = portPath;
    if (typeof baudRate === 'number' && baudRate > 0) picked.baudRate = baudRate;
    const knownParity = PARITIES.find(p => p === parity);
    if (knownParity) picked.parity = knownParity;
    if (dataBits === 5 || dataBits === 6 || dataBits === 7 || dataBits === 8) picked.dataBits = dataBits;
    if (stopBits === 1 || stopBits === 2) picked.stopBits = stopBits;
    if (typeof timeoutMs === 'number' && timeoutMs > 0) picked.timeoutMs = timeoutMs;
    return picked;
}

export function loadTransportConfig(configPath = getConfigPath()): TransportConfig {
    try {
        if (fs.existsSync(configPath)) {
            const data = fs.readFileSync(configPath, 'utf-8');
            return { ...DEFAULT_TRANSPORT_CONFIG, ...pickStored(JSON.parse(data)) };
        }
    } catch (error) {
        logger.error(`Failed to load transport config ${configPath}:`, error);
    }
    return { ...DEFAULT_TRANSPORT_CONFIG };
}

/** Returns false (after logging) when the file cannot be written. */
export function saveTransportConfig(config: TransportConfig, configPath = getConfigPath()): boolean {
    try {
        fs.mkdirSync(path.dirname(configPath), { recursive: true });
        fs.writeFileSync(configPath, JSON.stringify(config, null, 2), 'utf-8');
        return true;
    } catch (error) {
        logger.error(`Failed to save transport config ${configPath}:`, error);
        return false;
    }
}

/** A driver factory such as `createWatlow988`. */
export type DriverFactory<I> = (transport: Transport, timeoutMs: number) => I;

/** Builds the configured transport and the driver on top of it, with the configured read budget. */
export function instrumentFromConfig<I>(config: TransportConfig, factory: DriverFactory<I>): I {
    return factory(createTransport(config), config.timeoutMs);
}

export function createTransport(config: TransportConfig): Transport {
    if (config.type === 'virtual') {
        return new VirtualTransport();
    }
    if (!config.path) {
        throw new Error('Serial transport config has no port path');
    }
    return new SerialTransport({
        path: config.path,
        baudRate: config.baudRate,
        parity: config.parity,
        dataBits: config.dataBits,
        stopBits: config.stopBits
    });
}
