/**
 * Path: src/exchanges/common/types.ts
 */
import BigNumber from "bignumber.js"
import { CurrencyPair } from "../../models/CurrencyPair"
import { Currency } from "../../models/Currency"

// 호가 한 단계
export interface DepthEntry {
    price: BigNumber
    amount: BigNumber
}

// 표준화된 호가창 스냅샷
export interface Depth {
    exchange: string
    currencyPair: CurrencyPair
    timestamp: number
    asks: DepthEntry[] // 가격 오름차순
    bids: DepthEntry[] // 가격 내림차순
    isFrozen: boolean
    sequence?: number
}

// 표준화된 시세 스냅샷
export interface Ticker {
    exchange: string
    currencyPair: CurrencyPair
    timestamp: number
    last: BigNumber
    ask: BigNumber
    bid: BigNumber
    high?: BigNumber
    low?: BigNumber
    volume: BigNumber // 결제 통화 기준 거래량
    quoteVolume: BigNumber // 거래 대상 통화 기준 거래량
    percentChange: BigNumber
    isFrozen: boolean
}

export interface Trade {
    id: string
    currencyPair: CurrencyPair
    timestamp: number
    price: BigNumber
    amount: BigNumber
}

export interface TradeSiteAccount {
    currency: Currency
    balance: BigNumber
}

export interface TradeSiteUserAccount {
    apiKey: string
    secret: string
}

export enum TradeSiteRequestType {
    DEPTH = "DEPTH",
    TICKER = "TICKER",
    TRADES = "TRADES",
    ORDER = "ORDER",
    ACCOUNTS = "ACCOUNTS",
}
