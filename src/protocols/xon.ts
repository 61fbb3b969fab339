import { DecodeError, DeviceError, TimeoutError } from '../errors';
import log from '../logger';
import type { Transport } from '../transports/types';
import { Protocol, type ProtocolOptions } from './protocol';

const logger = log.scope('protocol');

export const XON = 0x11;
export const XOFF = 0x13;

export interface XonXoffProtocolOptions extends ProtocolOptions {
    /** Request issued after every operation to fetch the last error code, e.g. `? ER2\r`. */
    errorQuery?: string;
    errorMessages?: Readonly<Record<string, string>>;
}

/**
 * Half-duplex flow control. The instrument signals busy (XOFF) as soon as
 * it receives a request and ready (XON) when it is done; a query's value
 * follows the XON.
 *
 *     -> ? SP1\r          -> = SP1 25\r
 *     <- XOFF             <- XOFF
 *     <- XON 25\r         <- XON
 */
export class XonXoffProtocol extends Protocol {
    readonly id = 'xon';
    private readonly errorQuery: Buffer | null;
    private readonly errorMessages: Readonly<Record<string, string>>;

    constructor(options: XonXoffProtocolOptions) {
        super(options);
        this.errorQuery = options.errorQuery !== undefined ? Buffer.from(options.errorQuery, 'latin1') : null;
        this.errorMessages = options.errorMessages ?? {};
    }

    protected override async decodeRead(transport: Transport, request: Buffer): Promise<string> {
        await this.awaitReady(transport);
        const payload = await this.readLine(transport);
        this.expectEndOfResponse(transport, payload);
        await this.checkError(transport, request);
        return payload;
    }

    protected override async acknowledgeWrite(transport: Transport, request: Buffer): Promise<void> {
        await this.awaitReady(transport);
        this.expectEndOfResponse(transport, '');
        await this.checkError(transport, request);
    }

    /**
     * Consumes the busy signal, then waits for ready within the protocol's
     * time budget. Nothing after the request is interpreted before XON.
     */
    private async awaitReady(transport: Transport): Promise<void> {
        const deadline = Date.now() + this.timeoutMs;
        let busySeen = false;
        for (;;) {
            const remaining = deadline - Date.now();
            if (remaining <= 0) throw new TimeoutError('XON ready signal', this.timeoutMs);

            let byte: number;
            try {
                byte = (await transport.readBytes(1, remaining))[0];
            } catch (error) {
                if (error instanceof TimeoutError) {
                    throw new TimeoutError(busySeen ? 'XON ready signal' : 'XOFF busy signal', this.timeoutMs);
                }
                throw error;
            }

            if (byte === XOFF) {
                busySeen = true;
            } else if (byte === XON && busySeen) {
                return;
            } else {
                const label = byte === XON ? 'XON before XOFF' : `unexpected byte 0x${byte.toString(16).padStart(2, '0')}`;
                throw new DecodeError(String.fromCharCode(byte), label);
            }
        }
    }

    private async checkError(transport: Transport, request: Buffer): Promise<void> {
        if (!this.errorQuery) return;
        await transport.write(this.errorQuery);
        await this.awaitReady(transport);
        const code = await this.readLine(transport);
        this.expectEndOfResponse(transport, code);
        if (!/^\d+$/.test(code)) {
            throw new DecodeError(code, 'expected a numeric error code');
        }
        if (parseInt(code, 10) !== 0) {
            logger.warn(`${JSON.stringify(request.toString('latin1').trim())} returned error ${code}`);
            throw new DeviceError(code, this.errorMessages[code] ?? 'unknown error');
        }
    }
}
