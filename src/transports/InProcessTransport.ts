import log from '../logger';
import { BufferedTransport } from './BufferedTransport';

const logger = log.scope('in-process');

/** A transport with no byte stream behind it, for instruments on `CallProtocol`. */
export class InProcessTransport extends BufferedTransport {
    readonly name: string;
    private opened = false;

    constructor(name = 'in-process') {
        super();
        this.name = name;
    }

    async open(): Promise<void> {
        this.opened = true;
        logger.info(`${this.name}: opened`);
    }

    async close(): Promise<void> {
        this.opened = false;
        logger.info(`${this.name}: closed`);
    }

    isOpen(): boolean {
        return this.opened;
    }

    async write(data: Buffer): Promise<void> {
        throw new Error(`${this.name}: no byte stream to write ${data.length} byte(s) to`);
    }
}
