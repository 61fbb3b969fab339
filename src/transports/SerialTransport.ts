import { SerialPort } from 'serialport';
import log from '../logger';
import { BufferedTransport } from './BufferedTransport';
import type { Parity } from './types';

const logger = log.scope('serial');

export interface SerialTransportOptions {
    path: string;
    baudRate?: number;
    parity?: Parity;
    dataBits?: 5 | 6 | 7 | 8;
    stopBits?: 1 | 2;
}

export interface PortOpenOptions {
    path: string;
    baudRate: number;
    parity: Parity;
    dataBits: 5 | 6 | 7 | 8;
    stopBits: 1 | 2;
    autoOpen: false;
    rtscts: false;
}

type ErrorCallback = (err: Error | null) => void;

/** The part of a `serialport` stream this transport drives; `SerialPortMock` fits it too. */
export interface Port {
    readonly isOpen: boolean;
    open(callback: ErrorCallback): void;
    close(callback: ErrorCallback): void;
    write(data: Buffer, callback: (err: Error | null | undefined) => void): boolean;
    drain(callback: ErrorCallback): void;
    on(event: 'data', listener: (data: Buffer) => void): this;
    on(event: 'error', listener: (err: Error) => void): this;
    on(event: 'close', listener: () => void): this;
    removeAllListeners(): this;
}

export type PortFactory = (options: PortOpenOptions) => Port;

const defaultFactory: PortFactory = (options) => new SerialPort(options);

/** Thin pass-through to a serial line; framing lives entirely in the protocol. */
export class SerialTransport extends BufferedTransport {
    readonly name: string;
    private port: Port | null = null;
    private readonly options: PortOpenOptions;

    constructor(options: SerialTransportOptions, private readonly createPort: PortFactory = defaultFactory) {
        super();
        this.name = options.path;
        this.options = {
            path: options.path,
            baudRate: options.baudRate ?? 9600,
            parity: options.parity ?? 'none',
            dataBits: options.dataBits ?? 8,
            stopBits: options.stopBits ?? 1,
            autoOpen: false,
            rtscts: false // Explicitly disable hardware flow control
        };
    }

    async open(): Promise<void> {
        if (this.port?.isOpen) return;

        const { path, baudRate, dataBits, parity, stopBits } = this.options;
        logger.info(`Opening ${path} (${baudRate}, ${dataBits}, ${parity}, ${stopBits})`);

        const port = this.createPort(this.options);
        port.on('data', (data: Buffer) => {
            logger.debug(`${path} <- ${data.toString('hex').toUpperCase()}`);
            this.receive(data);
        });
        port.on('error', (err: Error) => {
            logger.error(`${path}: serial port error:`, err.message);
        });
        port.on('close', () => {
            logger.info(`${path}: port CLOSED`);
        });

        await new Promise<void>((resolve, reject) => {
            port.open((err) => {
                if (err) {
                    port.removeAllListeners();
                    reject(err);
                } else {
                    resolve();
                }
            });
        });
        this.port = port;
        logger.info(`${path}: port OPENED`);
    }

    async close(): Promise<void> {
        const port = this.port;
        this.port = null;
        if (!port) return;
        if (!port.isOpen) {
            port.removeAllListeners();
            return;
        }
        await new Promise<void>((resolve, reject) => {
            port.close((err) => {
                port.removeAllListeners();
                if (err) reject(err);
                else resolve();
            });
        });
    }

    isOpen(): boolean {
        return this.port?.isOpen ?? false;
    }

    async write(data: Buffer): Promise<void> {
        const port = this.port;
        if (!port || !port.isOpen) {
            throw new Error(`Serial port ${this.options.path} not open`);
        }
        logger.debug(`${this.options.path} -> ${data.toString('hex').toUpperCase()}`);
        await new Promise<void>((resolve, reject) => {
            port.write(data, (err) => {
                if (err) {
                    reject(err);
                    return;
                }
                port.drain((drainErr) => {
                    if (drainErr) reject(drainErr);
                    else resolve();
                });
            });
        });
    }
}
