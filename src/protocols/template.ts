import { DefinitionError } from '../errors';
import type { AttributeValue, FramingContext } from '../types';

export type TemplateScope = keyof FramingContext;

const SCOPES: readonly TemplateScope[] = ['param', 'subsys', 'instr', 'protocol'];

interface FormatSpec {
    zeroPad: boolean;
    width: number;
    precision: number | null;
    type: 'd' | 'i' | 'x' | 'X' | 'f' | 'e' | 's' | null;
}

type Segment =
    | { kind: 'literal'; text: string }
    | { kind: 'field'; scope: TemplateScope; attribute: string; spec: FormatSpec | null; source: string }
    | { kind: 'value'; spec: FormatSpec | null; source: string };

// {scope[attribute]:spec} or {val:spec}
const FIELD = /^(?:(param|subsys|instr|protocol)\[([A-Za-z_][A-Za-z0-9_]*)\]|(val))(?::(.*))?$/;
const SPEC = /^(0)?(\d+)?(?:\.(\d+))?([dixXfes])?$/;

function parseSpec(spec: string | undefined, source: string): FormatSpec | null {
    if (spec === undefined || spec === '') return null;
    const match = SPEC.exec(spec);
    if (!match) throw new DefinitionError(`Bad format spec "${spec}" in {${source}}`);
    const [, zero, width, precision, type] = match;
    return {
        zeroPad: zero === '0',
        width: width ? parseInt(width, 10) : 0,
        precision: precision ? parseInt(precision, 10) : null,
        type: (['d', 'i', 'x', 'X', 'f', 'e', 's'] as const).find(t => t === type) ?? null
    };
}

function toNumber(value: AttributeValue, source: string): number {
    const number = typeof value === 'number' ? value : Number(value);
    if (value === '' || Number.isNaN(number)) {
        throw new DefinitionError(`{${source}} needs a number, got ${JSON.stringify(value)}`);
    }
    return number;
}

function applySpec(value: AttributeValue, spec: FormatSpec | null, source: string): string {
    if (!spec) return String(value);

    let body: string;
    let numeric = true;
    switch (spec.type) {
        case 'd':
        case 'i':
            body = String(Math.trunc(toNumber(value, source)));
            break;
        case 'x':
            body = Math.trunc(toNumber(value, source)).toString(16);
            break;
        case 'X':
            body = Math.trunc(toNumber(value, source)).toString(16).toUpperCase();
            break;
        case 'f':
            body = toNumber(value, source).toFixed(spec.precision ?? 6);
            break;
        case 'e':
            body = toNumber(value, source).toExponential(spec.precision ?? 6);
            break;
        default:
            numeric = typeof value === 'number';
            body = spec.precision !== null && !numeric ? String(value).slice(0, spec.precision) : String(value);
    }

    if (body.length >= spec.width) return body;
    if (spec.zeroPad && numeric) {
        const sign = body.startsWith('-') ? '-' : '';
        return sign + body.slice(sign.length).padStart(spec.width - sign.length, '0');
    }
    return numeric ? body.padStart(spec.width) : body.padEnd(spec.width);
}

/**
 * A framing template such as `{subsys[mnemonic]}:{param[mnemonic]}?\r`.
 *
 * Parsed once, at driver-definition time: unknown scopes and malformed fields
 * throw immediately. Rendering is plain substitution, nothing is evaluated.
 */
export class FramingTemplate {
    readonly source: string;
    private readonly segments: Segment[];

    constructor(source: string, options: { allowValue: boolean }) {
        this.source = source;
        this.segments = FramingTemplate.parse(source, options.allowValue);
    }

    get usesValue(): boolean {
        return this.segments.some(segment => segment.kind === 'value');
    }

    /** Every `scope[attribute]` the template refers to. */
    get fields(): Array<{ scope: TemplateScope; attribute: string }> {
        return this.segments.flatMap(segment =>
            segment.kind === 'field' ? [{ scope: segment.scope, attribute: segment.attribute }] : []
        );
    }

    render(context: FramingContext, value?: string): string {
        let out = '';
        for (const segment of this.segments) {
            if (segment.kind === 'literal') {
                out += segment.text;
            } else if (segment.kind === 'value') {
                out += applySpec(value ?? '', segment.spec, segment.source);
            } else {
                const scope = context[segment.scope];
                if (!Object.prototype.hasOwnProperty.call(scope, segment.attribute)) {
                    throw new DefinitionError(
                        `Template ${JSON.stringify(this.source)}: no attribute "${segment.attribute}" in ${segment.scope}`
                    );
                }
                out += applySpec(scope[segment.attribute], segment.spec, segment.source);
            }
        }
        return out;
    }

    private static parse(source: string, allowValue: boolean): Segment[] {
        const segments: Segment[] = [];
        let literal = '';
        let i = 0;
        while (i < source.length) {
            const char = source[i];
            if (char === '{' && source[i + 1] === '{') {
                literal += '{';
                i += 2;
            } else if (char === '}' && source[i + 1] === '}') {
                literal += '}';
                i += 2;
            } else if (char === '}') {
                throw new DefinitionError(`Unmatched "}" at ${i} in template ${JSON.stringify(source)}`);
            } else if (char === '{') {
                const end = source.indexOf('}', i);
                if (end < 0) throw new DefinitionError(`Unclosed "{" at ${i} in template ${JSON.stringify(source)}`);
                const body = source.slice(i + 1, end);
                const match = FIELD.exec(body);
                if (!match) {
                    throw new DefinitionError(
                        `Unknown field {${body}} in template ${JSON.stringify(source)}; expected one of ${SCOPES.map(s => `${s}[...]`).join(', ')} or val`
                    );
                }
                if (literal) {
                    segments.push({ kind: 'literal', text: literal });
                    literal = '';
                }
                const [, scope, attribute, val, spec] = match;
                if (val) {
                    if (!allowValue) throw new DefinitionError(`{val} is only allowed in write templates: ${JSON.stringify(source)}`);
                    segments.push({ kind: 'value', spec: parseSpec(spec, body), source: body });
                } else {
                    const found = SCOPES.find(s => s === scope);
                    if (!found) throw new DefinitionError(`Unknown scope ${scope} in template ${JSON.stringify(source)}`);
                    segments.push({ kind: 'field', scope: found, attribute, spec: parseSpec(spec, body), source: body });
                }
                i = end + 1;
            } else {
                literal += char;
                i += 1;
            }
        }
        if (literal) segments.push({ kind: 'literal', text: literal });
        return segments;
    }
}
