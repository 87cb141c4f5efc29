/**
 * File: src/models/Currency.ts
 * Description: 통화 정보 데이터 모델
 */

export enum CurrencyType {
    CRYPTO = "CRYPTO",
    FIAT = "FIAT",
}

/** 통화 정보 */
export interface Currency {
    readonly code: string // 대문자 코드 (예: BTC)
    readonly name: string
    readonly description: string
    readonly type: CurrencyType
}

export interface CurrencyInput {
    code: string
    name?: string | null
    description?: string | null
    type?: CurrencyType
}

/** 통화 정보 생성 */
export function createCurrency(input: CurrencyInput): Currency {
    return Object.freeze({
        code: input.code.toUpperCase(),
        name: input.name ?? "",
        description: input.description ?? "",
        type: input.type ?? CurrencyType.CRYPTO,
    })
}

export function isCurrencyType(value: string): value is CurrencyType {
    return value === CurrencyType.CRYPTO || value === CurrencyType.FIAT
}
