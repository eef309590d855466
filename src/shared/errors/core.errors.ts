/**
 * @fileoverview Core Error Taxonomy
 *
 * Every failure the core raises extends {@link CoreError} and carries a stable
 * `code`. HTTP mapping lives in {@link CoreExceptionFilter}; nothing in here
 * knows about transport.
 */

export type CoreErrorCode =
    | 'UNKNOWN_FIELD'
    | 'INVALID_QUERY'
    | 'INVALID_INGESTION_REQUEST'
    | 'INVALID_FIELD_TABLE'
    | 'SEARCH_UNAVAILABLE'
    | 'RECORD_STORE_UNAVAILABLE'
    | 'VIRTUALIZATION_UNAVAILABLE'
    | 'DUPLICATE_KEY'
    | 'WOULD_THROTTLE'
    | 'GATE_INVARIANT_VIOLATION'
    | 'PERMIT_RELEASE';

export abstract class CoreError extends Error {
    abstract readonly code: CoreErrorCode;

    constructor(message: string, options?: ErrorOptions) {
        super(message, options);
        this.name = new.target.name;
    }
}

/* -------------------------------------------------------------------------- */
/*                              Caller errors                                  */
/* -------------------------------------------------------------------------- */

export class UnknownFieldError extends CoreError {
    readonly code = 'UNKNOWN_FIELD';

    constructor(readonly field: string) {
        super(`Unknown field '${field}'`);
    }
}

export class InvalidQueryError extends CoreError {
    readonly code = 'INVALID_QUERY';
}

export class InvalidIngestionRequestError extends CoreError {
    readonly code = 'INVALID_INGESTION_REQUEST';
}

/** Raised while loading a field encryption table that breaks the combination rules. */
export class InvalidFieldTableError extends CoreError {
    readonly code = 'INVALID_FIELD_TABLE';
}

/* -------------------------------------------------------------------------- */
/*                              Store errors                                   */
/* -------------------------------------------------------------------------- */

export class SearchUnavailableError extends CoreError {
    readonly code = 'SEARCH_UNAVAILABLE';
}

export class RecordStoreUnavailableError extends CoreError {
    readonly code = 'RECORD_STORE_UNAVAILABLE';
}

export class VirtualizationUnavailableError extends CoreError {
    readonly code = 'VIRTUALIZATION_UNAVAILABLE';
}

export type StoreName = 'search_store' | 'record_store';

export class DuplicateKeyError extends CoreError {
    readonly code = 'DUPLICATE_KEY';

    constructor(readonly store: StoreName, readonly customerId: string, options?: ErrorOptions) {
        super(`Duplicate key for customer ${customerId} in ${store}`, options);
    }
}

/* -------------------------------------------------------------------------- */
/*                              License gate errors                            */
/* -------------------------------------------------------------------------- */

export class WouldThrottleError extends CoreError {
    readonly code = 'WOULD_THROTTLE';
}

/** More holders than the ceiling were observed. Not recoverable. */
export class GateInvariantViolationError extends CoreError {
    readonly code = 'GATE_INVARIANT_VIOLATION';
}

/** A permit was released twice or did not come from this gate. */
export class PermitReleaseError extends CoreError {
    readonly code = 'PERMIT_RELEASE';
}
