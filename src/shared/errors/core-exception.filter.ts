/**
 * @fileoverview Core Exception Filter
 *
 * Translates {@link CoreError}s into HTTP responses. Anything else falls
 * through to Nest's default handling.
 */

import { ArgumentsHost, Catch, ExceptionFilter, HttpStatus, Logger } from '@nestjs/common';
import { Response } from 'express';
import { CoreError, CoreErrorCode } from './core.errors';

const STATUS_BY_CODE: Record<CoreErrorCode, HttpStatus> = {
    UNKNOWN_FIELD: HttpStatus.BAD_REQUEST,
    INVALID_QUERY: HttpStatus.BAD_REQUEST,
    INVALID_INGESTION_REQUEST: HttpStatus.BAD_REQUEST,
    INVALID_FIELD_TABLE: HttpStatus.INTERNAL_SERVER_ERROR,
    SEARCH_UNAVAILABLE: HttpStatus.SERVICE_UNAVAILABLE,
    RECORD_STORE_UNAVAILABLE: HttpStatus.SERVICE_UNAVAILABLE,
    VIRTUALIZATION_UNAVAILABLE: HttpStatus.SERVICE_UNAVAILABLE,
    DUPLICATE_KEY: HttpStatus.CONFLICT,
    WOULD_THROTTLE: HttpStatus.TOO_MANY_REQUESTS,
    GATE_INVARIANT_VIOLATION: HttpStatus.INTERNAL_SERVER_ERROR,
    PERMIT_RELEASE: HttpStatus.INTERNAL_SERVER_ERROR,
};

export interface CoreErrorBody {
    statusCode: number;
    error: CoreErrorCode;
    message: string;
}

export function toErrorBody(error: CoreError): CoreErrorBody {
    return {
        statusCode: STATUS_BY_CODE[error.code],
        error: error.code,
        message: error.message,
    };
}

@Catch(CoreError)
export class CoreExceptionFilter implements ExceptionFilter<CoreError> {
    private readonly logger = new Logger(CoreExceptionFilter.name);

    catch(error: CoreError, host: ArgumentsHost): void {
        const body = toErrorBody(error);

        if (body.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
            this.logger.error({ msg: 'Request failed', code: error.code, error });
        } else {
            this.logger.warn({ msg: 'Request rejected', code: error.code, reason: error.message });
        }

        host.switchToHttp().getResponse<Response>().status(body.statusCode).json(body);
    }
}
