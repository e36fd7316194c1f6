/** Rejected argument, e.g. an id that is already taken. */
export class InvalidArgumentError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidArgumentError';
    }
}

/** A value that does not satisfy the property's constraints or cannot be parsed. */
export class InvalidValueError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'InvalidValueError';
    }
}

export class NoSuchKeyError extends Error {
    constructor(readonly key: string, message = `No mapping for key ${key}`) {
        super(message);
        this.name = 'NoSuchKeyError';
    }
}

export class IllegalStateError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'IllegalStateError';
    }
}
