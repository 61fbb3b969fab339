import { DecodeError, DeviceError } from '../errors';
import type { Transport } from '../transports/types';
import { Protocol } from './protocol';

const isStatus = (line: string): boolean => line.startsWith(':OK') || line.startsWith(':ERR');

/**
 * The instrument echoes each request, answers reads with a `:`-prefixed
 * line, and closes every exchange with `:OK` or `:ERR <n>`.
 *
 *     -> :r 0107\r
 *     <- :r 0107\r
 *     <- :1200\r
 *     <- :OK\r
 */
export class EchoStatusProtocol extends Protocol {
    readonly id = 'echo';

    protected override async decodeRead(transport: Transport, request: Buffer): Promise<string> {
        await this.readEcho(transport, request);
        const answer = await this.readLine(transport);
        if (isStatus(answer)) {
            // A rejected read skips the answer line
            this.checkStatus(answer);
            throw new DecodeError(answer, 'status before the answer');
        }
        const status = await this.readLine(transport);
        this.checkStatus(status);
        this.expectEndOfResponse(transport, answer);
        if (!answer.startsWith(':')) {
            throw new DecodeError(answer, 'expected ":" before the answer');
        }
        return answer.slice(1);
    }

    protected override async acknowledgeWrite(transport: Transport, request: Buffer): Promise<void> {
        await this.readEcho(transport, request);
        const status = await this.readLine(transport);
        this.checkStatus(status);
        this.expectEndOfResponse(transport, status);
    }

    private async readEcho(transport: Transport, request: Buffer): Promise<void> {
        const echo = await this.readLine(transport);
        if (echo !== request.toString('latin1').trim()) {
            throw new DecodeError(echo, 'echo does not match the request');
        }
    }

    private checkStatus(status: string): void {
        if (status.startsWith(':OK')) return;
        const error = /^:ERR\s*(\S+)/.exec(status);
        if (error) throw new DeviceError(error[1]);
        throw new DecodeError(status, 'expected :OK or :ERR');
    }
}
