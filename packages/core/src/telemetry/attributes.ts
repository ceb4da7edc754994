import type { OtlpKeyValue } from './types.js';

export interface Attribute {
    readonly key: string;
    readonly value: string;
}

/**
 * Ordered key/value pairs shared by a step's spans, logs and data points.
 * Keys are not deduplicated.
 */
export type AttributeSet = readonly Attribute[];

export const EMPTY_ATTRIBUTES: AttributeSet = Object.freeze([]);

/**
 * Splits `key=value` on the first `=` only; a pair without `=` gets an empty value.
 */
export function parseAttributePair(pair: string): Attribute {
    const separator = pair.indexOf('=');
    if (separator === -1) {
        return { key: pair, value: '' };
    }
    return { key: pair.slice(0, separator), value: pair.slice(separator + 1) };
}

export function parseAttributePairs(pairs: readonly string[]): AttributeSet {
    return pairs.map(parseAttributePair);
}

export type AttributeInput = readonly string[] | Readonly<Record<string, string>>;

export function attributesFrom(input: AttributeInput): AttributeSet {
    if (isPairList(input)) {
        return parseAttributePairs(input);
    }
    return Object.entries(input).map(([key, value]) => ({ key, value }));
}

export function toOtlpAttributes(attributes: AttributeSet): OtlpKeyValue[] {
    return attributes.map(({ key, value }) => ({ key, value: { stringValue: value } }));
}

function isPairList(input: AttributeInput): input is readonly string[] {
    return Array.isArray(input);
}
