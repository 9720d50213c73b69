export type AssemblyErrorKind = "reference" | "constraint" | "sequence";

function describeValue(value: unknown): string {
    if (typeof value === "string") return `"${value}"`;
    if (value === undefined) return "undefined";
    try {
        return JSON.stringify(value);
    } catch {
        return String(value);
    }
}

/**
 * Rejection of a single choice. The record the choice was applied to is left
 * untouched and the engine stays usable.
 */
export class AssemblyError extends Error {
    readonly kind: AssemblyErrorKind;
    readonly field: string;
    readonly value: unknown;

    constructor(kind: AssemblyErrorKind, field: string, value: unknown, message: string) {
        super(message);
        this.name = "AssemblyError";
        this.kind = kind;
        this.field = field;
        this.value = value;
    }
}

/** A name that the content catalog does not know. */
export class CatalogReferenceError extends AssemblyError {
    constructor(field: string, value: unknown, detail?: string) {
        super("reference", field, value, `Unknown ${field} ${describeValue(value)}${detail ? `: ${detail}` : ""}`);
        this.name = "CatalogReferenceError";
    }
}

export class ConstraintError extends AssemblyError {
    constructor(field: string, value: unknown, detail: string) {
        super("constraint", field, value, `Invalid ${field} ${describeValue(value)}: ${detail}`);
        this.name = "ConstraintError";
    }
}

export class SequenceError extends AssemblyError {
    constructor(field: string, value: unknown, detail: string) {
        super("sequence", field, value, `Cannot apply ${field} ${describeValue(value)}: ${detail}`);
        this.name = "SequenceError";
    }
}

export function isAssemblyError(value: unknown): value is AssemblyError {
    return value instanceof AssemblyError;
}
