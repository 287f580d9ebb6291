export type RollplotErrorCode =
    | 'ConfigurationMismatch'
    | 'InvalidConfiguration'
    | 'IndexOutOfRange'
    | 'ValueCountMismatch';

export class RollplotError extends Error {
    constructor(
        public readonly code: RollplotErrorCode,
        message: string
    ) {
        super(message);
        this.name = new.target.name;
    }
}

/**
 * A per-row list (styles, labels, ticks, legends) does not have one entry per row,
 * or a row's legend list does not have one entry per overlaid series.
 */
export class ConfigurationMismatchError extends RollplotError {
    constructor(
        public readonly listName: string,
        public readonly expected: number,
        public readonly actual: number
    ) {
        super('ConfigurationMismatch', `${listName}: expected ${expected} entries, got ${actual}`);
    }
}

export class InvalidConfigurationError extends RollplotError {
    constructor(message: string) {
        super('InvalidConfiguration', message);
    }
}

export class IndexOutOfRangeError extends RollplotError {
    constructor(
        public readonly index: number,
        public readonly rowCount: number
    ) {
        super('IndexOutOfRange', `Row index ${index} must be in [0,${rowCount})`);
    }
}

/**
 * The data source returned a different number of values than the rows consume.
 * Never retried: padding or truncating would shift values into unrelated rows.
 */
export class ValueCountMismatchError extends RollplotError {
    constructor(
        public readonly expected: number,
        public readonly received: number
    ) {
        super('ValueCountMismatch', `Expected ${expected} values but received ${received}`);
    }
}
