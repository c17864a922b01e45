export class AppError extends Error {
    exitCode: number;
    code: string | undefined;
    constructor(message: string, exitCode = 1, code?: string) {
        super(message);
        this.name = new.target.name;
        this.exitCode = exitCode;
        this.code = code;
    }
}

/**
 * Raised for any malformed CSV input. `row` is the 1-based line the offending
 * record starts on.
 */
export class CsvParseError extends AppError {
    source: string;
    row: number;
    constructor(source: string, row: number, detail: string) {
        super(`${source}: row ${row}: ${detail}`, 1, 'CSV_PARSE');
        this.source = source;
        this.row = row;
    }
}

export class SelectionError extends AppError {
    constructor(message: string) {
        super(message, 1, 'SELECTION');
    }
}

export class ConfigError extends AppError {
    constructor(message: string) {
        super(message, 1, 'CONFIG');
    }
}

export class UsageError extends AppError {
    constructor(message: string) {
        super(message, 2, 'USAGE');
    }
}
