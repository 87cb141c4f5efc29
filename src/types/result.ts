/**
 * Path: src/types/result.ts
 * 클라이언트 작업 결과 타입
 */
import { ErrorCode, ErrorSeverity, TradeSiteError } from "../errors/types"

export interface Ok<T> {
    status: "ok"
    value: T
}

export interface NotImplemented {
    status: "notImplemented"
    operation: string
    message: string
}

export interface Failure {
    status: "failure"
    error: TradeSiteError
}

export type Result<T> = Ok<T> | NotImplemented | Failure

export function ok<T>(value: T): Ok<T> {
    return { status: "ok", value }
}

export function notImplemented(
    operation: string,
    exchange: string
): NotImplemented {
    return {
        status: "notImplemented",
        operation,
        message: `${operation} is not yet implemented for ${exchange}`,
    }
}

export function failure(
    code: ErrorCode,
    message: string,
    originalError?: Error,
    severity?: ErrorSeverity
): Failure {
    return {
        status: "failure",
        error: new TradeSiteError(code, message, originalError, severity),
    }
}

export function isOk<T>(result: Result<T>): result is Ok<T> {
    return result.status === "ok"
}
