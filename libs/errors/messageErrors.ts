/**
 * Engine error taxonomy.
 *
 * FormatError            no recognized top-level wire format
 * ParseError             malformed structure inside a recognized format (fatal)
 * UnsupportedFormatError unknown translation target
 * ConfigurationError     invalid DUALWIRE_* environment
 *
 * Business-rule failures are never thrown; validators return reports.
 */

export type EngineErrorCode =
    | 'FORMAT_ERROR'
    | 'PARSE_ERROR'
    | 'UNSUPPORTED_FORMAT'
    | 'CONFIG_ERROR';

export type WireFormat = 'MX' | 'MT';

export abstract class MessageEngineError extends Error {
    abstract readonly code: EngineErrorCode;
    public override cause?: unknown;

    constructor(
        message: string,
        public readonly details: Readonly<Record<string, unknown>> = {},
        options?: { cause?: unknown }
    ) {
        super(message);
        this.name = new.target.name;
        this.cause = options?.cause;
    }
}

export class FormatError extends MessageEngineError {
    readonly code = 'FORMAT_ERROR';

    constructor(public readonly scannedBytes: number) {
        super(`No MX or MT signature found in the first ${scannedBytes} bytes`, { scannedBytes });
    }
}

export class ParseError extends MessageEngineError {
    readonly code = 'PARSE_ERROR';
    public readonly line: number | null;
    public readonly column: number | null;

    constructor(
        public readonly format: WireFormat,
        message: string,
        position?: { line?: number; column?: number },
        options?: { cause?: unknown }
    ) {
        super(`${format} parse failure: ${message}`, { format, ...position }, options);
        this.line = position?.line ?? null;
        this.column = position?.column ?? null;
    }
}

export class UnsupportedFormatError extends MessageEngineError {
    readonly code = 'UNSUPPORTED_FORMAT';

    constructor(
        public readonly target: string,
        public readonly supported: readonly string[]
    ) {
        super(`Unsupported translation target '${target}'. Supported: ${supported.join(', ')}`, { target, supported });
    }
}

export class ConfigurationError extends MessageEngineError {
    readonly code = 'CONFIG_ERROR';

    constructor(public readonly violations: readonly string[]) {
        super(violations.join('; '), { violations });
    }
}
