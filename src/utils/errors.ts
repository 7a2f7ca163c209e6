/**
 * The catalog export directory is missing or unreadable.
 * A single missing or malformed file is not an error (see loadCatalogRecords).
 */
export class CatalogLoadError extends Error {
    constructor(
        message: string,
        public readonly dataDir: string
    ) {
        super(message);
        this.name = 'CatalogLoadError';
    }
}

/**
 * Export requested in a format no exporter handles.
 */
export class UnsupportedFormatError extends Error {
    constructor(
        public readonly format: string,
        public readonly supported: readonly string[]
    ) {
        super(`Unsupported export format: ${format}. Valid: ${supported.join(', ')}`);
        this.name = 'UnsupportedFormatError';
    }
}

/**
 * A command-line option with a value the command cannot use.
 */
export class InvalidOptionError extends Error {
    constructor(
        public readonly option: string,
        public readonly value: string
    ) {
        super(`Invalid value for ${option}: ${value}`);
        this.name = 'InvalidOptionError';
    }
}
