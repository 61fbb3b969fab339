import { DecodeError, DeviceError } from '../errors';
import log from '../logger';
import type { Transport } from '../transports/types';
import { Protocol, type ProtocolOptions } from './protocol';

const logger = log.scope('protocol');

export interface StatusCodeProtocolOptions extends ProtocolOptions {
    successCode?: string;
    errorMessages?: Readonly<Record<string, string>>;
}

/**
 * Every answer starts with a numeric status line. Success is followed by the
 * payload line on reads; any other code fails the whole exchange.
 *
 *     -> QM\r
 *     <- 0\r
 *     <- 23.0,C\r
 */
export class StatusCodeProtocol extends Protocol {
    readonly id: string = 'status';
    private readonly successCode: string;
    private readonly errorMessages: Readonly<Record<string, string>>;

    constructor(options: StatusCodeProtocolOptions) {
        super(options);
        this.successCode = options.successCode ?? '0';
        this.errorMessages = options.errorMessages ?? {};
    }

    protected override async decodeRead(transport: Transport, request: Buffer): Promise<string> {
        await this.readStatus(transport, request);
        const payload = await this.readLine(transport);
        this.expectEndOfResponse(transport, payload);
        return payload;
    }

    protected override async acknowledgeWrite(transport: Transport, request: Buffer): Promise<void> {
        const status = await this.readStatus(transport, request);
        this.expectEndOfResponse(transport, status);
    }

    private async readStatus(transport: Transport, request: Buffer): Promise<string> {
        const status = await this.readLine(transport);
        if (!/^\d+$/.test(status)) {
            throw new DecodeError(status, 'expected a numeric status code');
        }
        if (status !== this.successCode) {
            logger.warn(`${JSON.stringify(request.toString('latin1').trim())} returned status ${status}`);
            throw new DeviceError(status, this.errorMessages[status]);
        }
        return status;
    }
}
