import { InvalidValueError } from './errors';

export type ColorTriple = [number, number, number];

function requireIntegers(kind: string, components: ColorTriple): void {
    if (!components.every(component => Number.isInteger(component))) {
        throw new InvalidValueError(`${kind} components must be integers, got ${components.join(',')}`);
    }
}

export class RGB {
    constructor(readonly red: number,
                readonly green: number,
                readonly blue: number) {
        requireIntegers('RGB', [red, green, blue]);
    }

    static fromTriple([red, green, blue]: ColorTriple): RGB {
        return new RGB(red, green, blue);
    }

    toString(): string {
        return `${this.red},${this.green},${this.blue}`;
    }
}

export class HSV {
    constructor(readonly hue: number,
                readonly saturation: number,
                readonly value: number) {
        requireIntegers('HSV', [hue, saturation, value]);
    }

    static fromTriple([hue, saturation, value]: ColorTriple): HSV {
        return new HSV(hue, saturation, value);
    }

    toString(): string {
        return `${this.hue},${this.saturation},${this.value}`;
    }
}
