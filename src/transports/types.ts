/**
 * A byte-stream endpoint. One read at a time: interleaving logical operations
 * on a shared transport is the instrument's job, not the transport's.
 */
export interface Transport {
    readonly name: string;
    open(): Promise<void>;
    close(): Promise<void>;
    isOpen(): boolean;
    write(data: Buffer): Promise<void>;
    /** Bytes received before `terminator`; the terminator itself is consumed. */
    read(terminator: Buffer, timeoutMs: number): Promise<Buffer>;
    readBytes(count: number, timeoutMs: number): Promise<Buffer>;
    /** Number of received bytes not consumed yet. */
    available(): number;
    /** Drops unconsumed input and returns it. */
    discardInput(): Buffer;
}

export type Parity = 'none' | 'even' | 'odd' | 'mark' | 'space';
