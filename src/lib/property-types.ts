import { ColorTriple, HSV, RGB } from './color';
import { InvalidValueError, NoSuchKeyError } from './errors';
import { HomieDatatype, NumberRange } from './interfaces';

/**
 * How a datatype looks on the wire. `format` is fixed when the type is created.
 */
export interface PropertyType<T> {
    readonly datatype: HomieDatatype;
    readonly format?: string;

    /** Throws if the value may not be published. */
    validate(value: T): void;

    toPayload(value: T): string;

    fromPayload(payload: string): T;
}

const INTEGER_PATTERN = /^[+-]?\d+$/;
const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

const noValidation = (): void => undefined;

function checkRange(value: number, range?: NumberRange): void {
    if (range && (value < range.min || value > range.max)) {
        throw new InvalidValueError(`Value ${value} is outside of ${range.min}:${range.max}`);
    }
}

function rangeFormat(range?: NumberRange): string | undefined {
    return range ? `${range.min}:${range.max}` : undefined;
}

function parseColor(payload: string): ColorTriple {
    const parts = payload.split(',');
    if (parts.length < 3) {
        throw new InvalidValueError(`Color payload ${payload} needs three components`);
    }
    const [first, second, third] = parts.map(part => {
        const trimmed = part.trim();
        if (!INTEGER_PATTERN.test(trimmed)) {
            throw new InvalidValueError(`Color component ${part} in ${payload} is not an integer`);
        }

        return Number.parseInt(trimmed, 10);
    });

    return [first, second, third];
}

export const stringType: PropertyType<string> = {
    datatype: 'string',
    validate: noValidation,
    toPayload: value => value,
    fromPayload: payload => payload
};

export const booleanType: PropertyType<boolean> = {
    datatype: 'boolean',
    validate: noValidation,
    toPayload: value => value.toString(),
    fromPayload: payload => payload.toLowerCase() === 'true'
};

export function integerType(range?: NumberRange): PropertyType<number> {
    return {
        datatype: 'integer',
        format: rangeFormat(range),
        validate: value => {
            if (!Number.isSafeInteger(value)) {
                throw new InvalidValueError(`Value ${value} is not a safe integer`);
            }
            checkRange(value, range);
        },
        toPayload: value => value.toString(10),
        fromPayload: payload => {
            if (!INTEGER_PATTERN.test(payload)) {
                throw new InvalidValueError(`Payload ${payload} is not an integer`);
            }
            const value = Number.parseInt(payload, 10);
            if (!Number.isSafeInteger(value)) {
                throw new InvalidValueError(`Payload ${payload} is out of the safe integer range`);
            }

            return value;
        }
    };
}

export function floatType(range?: NumberRange): PropertyType<number> {
    return {
        datatype: 'float',
        format: rangeFormat(range),
        validate: value => {
            if (!Number.isFinite(value)) {
                throw new InvalidValueError(`Value ${value} is not a finite number`);
            }
            checkRange(value, range);
        },
        toPayload: value => value.toString(),
        fromPayload: payload => {
            const value = DECIMAL_PATTERN.test(payload) ? Number(payload) : Number.NaN;
            if (!Number.isFinite(value)) {
                throw new InvalidValueError(`Payload ${payload} is not a number`);
            }

            return value;
        }
    };
}

/**
 * `mapping` pairs wire values with domain values; its iteration order is the order of `$format`.
 */
export function enumType<E>(mapping: Iterable<readonly [string, E]>): PropertyType<E> {
    const byWireValue = new Map<string, E>(mapping);
    const format = [...byWireValue.keys()].join(',');
    const wireValueOf = (value: E): string => {
        for (const [wireValue, mapped] of byWireValue) {
            if (mapped === value) {
                return wireValue;
            }
        }
        throw new InvalidValueError(`Value ${String(value)} is not one of ${format}`);
    };

    return {
        datatype: 'enum',
        format,
        validate: value => {
            wireValueOf(value);
        },
        toPayload: wireValueOf,
        fromPayload: payload => {
            const value = byWireValue.get(payload);
            if (value === undefined) {
                throw new NoSuchKeyError(payload);
            }

            return value;
        }
    };
}

export const hsvType: PropertyType<HSV> = {
    datatype: 'color',
    format: 'hsv',
    validate: noValidation,
    toPayload: value => value.toString(),
    fromPayload: payload => HSV.fromTriple(parseColor(payload))
};

export const rgbType: PropertyType<RGB> = {
    datatype: 'color',
    format: 'rgb',
    validate: noValidation,
    toPayload: value => value.toString(),
    fromPayload: payload => RGB.fromTriple(parseColor(payload))
};
