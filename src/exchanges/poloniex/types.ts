/**
 * Path: src/exchanges/poloniex/types.ts
 */
import BigNumber from "bignumber.js"

// [가격, 수량] - 가격은 문자열, 수량은 숫자로 내려옴
export type PoloniexDepthLevel = [string, string | number]

// returnOrderBook 응답
export interface PoloniexOrderBookResponse {
    asks: PoloniexDepthLevel[]
    bids: PoloniexDepthLevel[]
    isFrozen?: string // "0" | "1"
    seq?: number
}

// returnTicker 응답의 마켓 하나
export interface PoloniexTickerEntry {
    id?: number
    last: string
    lowestAsk: string
    highestBid: string
    percentChange: string
    baseVolume: string
    quoteVolume: string
    isFrozen?: string
    high24hr?: string | number
    low24hr?: string | number
}

export interface PoloniexErrorResponse {
    error: string
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value)
}

export function isNumeric(value: unknown): value is string | number {
    if (typeof value !== "string" && typeof value !== "number") return false
    if (typeof value === "string" && value.trim() === "") return false
    return !new BigNumber(value).isNaN()
}

export function isPoloniexError(data: unknown): data is PoloniexErrorResponse {
    return isRecord(data) && typeof data.error === "string"
}

function isDepthLevel(level: unknown): level is PoloniexDepthLevel {
    return (
        Array.isArray(level) &&
        level.length >= 2 &&
        typeof level[0] === "string" &&
        isNumeric(level[0]) &&
        isNumeric(level[1])
    )
}

// 선택 필드는 없거나 올바른 타입이어야 한다
function isOptionalString(value: unknown): boolean {
    return value === undefined || typeof value === "string"
}

function isOptionalNumeric(value: unknown): boolean {
    return value === undefined || isNumeric(value)
}

export function isOrderBookResponse(
    data: unknown
): data is PoloniexOrderBookResponse {
    return (
        isRecord(data) &&
        Array.isArray(data.asks) &&
        Array.isArray(data.bids) &&
        data.asks.every(isDepthLevel) &&
        data.bids.every(isDepthLevel) &&
        isOptionalString(data.isFrozen) &&
        (data.seq === undefined || typeof data.seq === "number")
    )
}

export function isTickerEntry(entry: unknown): entry is PoloniexTickerEntry {
    return (
        isRecord(entry) &&
        isNumeric(entry.last) &&
        isNumeric(entry.lowestAsk) &&
        isNumeric(entry.highestBid) &&
        isNumeric(entry.percentChange) &&
        isNumeric(entry.baseVolume) &&
        isNumeric(entry.quoteVolume) &&
        isOptionalNumeric(entry.high24hr) &&
        isOptionalNumeric(entry.low24hr) &&
        isOptionalString(entry.isFrozen)
    )
}

// 폴로닉스 마켓 이름 변환 (예: BTC_NXT)
export const convertPoloniexPairName = {
    toPairName: (base: string, quote: string): string => {
        return `${base.toUpperCase()}_${quote.toUpperCase()}`
    },
    fromPairName: (name: string): { base: string; quote: string } | null => {
        const parts = name.split("_")
        if (parts.length !== 2) return null

        const [base, quote] = parts
        if (!base || !quote) return null
        return { base, quote }
    },
}
