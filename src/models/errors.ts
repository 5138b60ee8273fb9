// src/models/errors.ts

/**
 * Typed failures raised by the codec, store and scheduling engine.
 * Nothing in the core retries: callers decide whether to re-prompt.
 */
export type ClinicStoreErrorCode =
    | 'FORMAT_ERROR'
    | 'DUPLICATE_KEY'
    | 'NOT_FOUND'
    | 'INVALID_TIME_WINDOW'
    | 'CONFLICT'
    | 'IO_ERROR';

export type EntityKind = 'patient' | 'doctor' | 'appointment';

export abstract class ClinicStoreError extends Error {
    abstract readonly code: ClinicStoreErrorCode;

    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

/**
 * Malformed record while decoding. Only integer tokens are ever checked.
 */
export class FormatError extends ClinicStoreError {
    readonly code = 'FORMAT_ERROR';

    constructor(
        readonly token: string,
        readonly line: number,
        readonly column: string
    ) {
        super(`Invalid ${column} ${JSON.stringify(token)} on line ${line}: expected an integer`);
    }
}

export class DuplicateKeyError extends ClinicStoreError {
    readonly code = 'DUPLICATE_KEY';

    constructor(readonly entity: EntityKind, readonly id: number) {
        super(`${capitalize(entity)} ${id} already exists`);
    }
}

export class NotFoundError extends ClinicStoreError {
    readonly code = 'NOT_FOUND';

    constructor(readonly entity: EntityKind, readonly id: number) {
        super(entity === 'appointment'
            ? `No appointment for patient ${id}`
            : `${capitalize(entity)} ${id} not found`);
    }
}

export class InvalidTimeWindowError extends ClinicStoreError {
    readonly code = 'INVALID_TIME_WINDOW';

    constructor(readonly start: string) {
        super(`Appointments cannot start at ${start}: hours 11 and 12 are closed`);
    }
}

export class ConflictError extends ClinicStoreError {
    readonly code = 'CONFLICT';

    constructor(
        readonly doctorId: number,
        readonly start: string,
        readonly existing: { patientId: number; start: string; end: string }
    ) {
        super(`Doctor ${doctorId} is already booked from ${existing.start} to ${existing.end} (requested start ${start})`);
    }
}

export class StoreIOError extends ClinicStoreError {
    readonly code = 'IO_ERROR';

    constructor(readonly path: string, cause: unknown) {
        super(`Cannot access ${path}: ${describeCause(cause)}`, { cause });
    }
}

export function isClinicStoreError(error: unknown): error is ClinicStoreError {
    return error instanceof ClinicStoreError;
}

function describeCause(cause: unknown): string {
    if (typeof cause === 'object' && cause !== null && 'message' in cause && typeof cause.message === 'string') {
        return cause.message;
    }
    return String(cause);
}

function capitalize(value: string): string {
    return value.charAt(0).toUpperCase() + value.slice(1);
}
