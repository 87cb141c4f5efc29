/**
 * Path: src/errors/types.ts
 * 거래소 클라이언트 에러 타입 정의
 */

export enum ErrorCode {
    CURRENCY_NOT_SUPPORTED = "CURRENCY_NOT_SUPPORTED",
    DATA_NOT_AVAILABLE = "DATA_NOT_AVAILABLE",
    PERSISTENCE_IO_FAILURE = "PERSISTENCE_IO_FAILURE",
    PERSISTENCE_FORMAT_ERROR = "PERSISTENCE_FORMAT_ERROR",
    UNKNOWN_ORDER_TYPE = "UNKNOWN_ORDER_TYPE",
    INVALID_CONFIG = "INVALID_CONFIG",
}

export enum ErrorSeverity {
    LOW = "LOW",
    MEDIUM = "MEDIUM",
    HIGH = "HIGH",
    CRITICAL = "CRITICAL",
}

export class TradeSiteError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        public readonly originalError?: Error,
        public readonly severity: ErrorSeverity = ErrorSeverity.MEDIUM
    ) {
        super(message)
        this.name = "TradeSiteError"
    }

    toString(): string {
        return `${this.name}[${this.code}]: ${this.message}`
    }
}

export function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error))
}
