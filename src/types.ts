export type AttributeValue = string | number;

export type Attributes = Record<string, AttributeValue>;

export type Access = 'read-only' | 'write-only' | 'read-write';

/** The four namespaces a framing template can draw from. */
export interface FramingContext {
    param: Readonly<Attributes>;
    subsys: Readonly<Attributes>;
    instr: Readonly<Attributes>;
    protocol: Readonly<Attributes>;
}
