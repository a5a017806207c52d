/**
 * Custom error classes for the ingestion pipeline.
 *
 * Extraction code catches these by class to pick a log severity; anything
 * that is not an `AppError` (driver errors, constraint violations) is left
 * to propagate.
 *
 * Usage:
 *   throw new ToolchainMissingError("pdftoppm")
 *   throw new ConfigError("Invalid configuration", [{ field: "OCR_DPI", message: "Too small" }])
 */

export type ErrorCode =
    | "CONFIG_INVALID"
    | "TOOLCHAIN_MISSING"
    | "CORRUPT_DOCUMENT"
    | "UNSUPPORTED_DOCUMENT";

export interface ErrorDetail {
    field?: string;
    message: string;
}

export interface SerializedError {
    code: ErrorCode;
    message: string;
    details?: ErrorDetail[];
}

/**
 * Base application error class.
 * All custom errors extend this for consistent handling.
 */
export class AppError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly details?: ErrorDetail[]
    ) {
        super(message);
        this.name = this.constructor.name;
        Object.setPrototypeOf(this, new.target.prototype);
        Error.captureStackTrace(this, this.constructor);
    }

    toJSON(): SerializedError {
        return {
            code: this.code,
            message: this.message,
            ...(this.details && { details: this.details }),
        };
    }
}

/** Environment variables failed validation */
export class ConfigError extends AppError {
    constructor(message = "Invalid configuration", details?: ErrorDetail[]) {
        super("CONFIG_INVALID", message, details);
    }

    static fromZodError(error: { issues: Array<{ path: (string | number)[]; message: string }> }): ConfigError {
        const details = error.issues.map((issue) => ({
            field: issue.path.join("."),
            message: issue.message,
        }));
        const fields = details.map((detail) => detail.field).join(", ");
        return new ConfigError(`Invalid configuration: ${fields}`, details);
    }
}

/** An external rasterization or OCR binary could not be executed */
export class ToolchainMissingError extends AppError {
    constructor(public readonly command: string) {
        super("TOOLCHAIN_MISSING", `Required command "${command}" was not found`);
    }
}

/** The document bytes could not be parsed as the format they claim to be */
export class CorruptDocumentError extends AppError {
    constructor(message = "Document is corrupt or unreadable") {
        super("CORRUPT_DOCUMENT", message);
    }
}

export class UnsupportedDocumentError extends AppError {
    constructor(public readonly mimeType: string) {
        super("UNSUPPORTED_DOCUMENT", `No extractor registered for MIME type: ${mimeType}`);
    }
}
