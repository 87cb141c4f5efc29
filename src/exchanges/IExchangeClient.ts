/**
 * Path: src/exchanges/IExchangeClient.ts
 */
import { CurrencyPair } from "../models/CurrencyPair"
import { Order, OrderStatus, SiteOrder } from "../models/Order"
import { Price } from "../models/Price"
import { Result } from "../types/result"
import {
    Depth,
    Ticker,
    Trade,
    TradeSiteAccount,
    TradeSiteRequestType,
    TradeSiteUserAccount,
} from "./common/types"

export interface IExchangeClient {
    getName(): string
    getSupportedCurrencyPairs(): CurrencyPair[]
    isSupportedCurrencyPair(currencyPair: CurrencyPair): boolean

    getDepth(currencyPair: CurrencyPair): Promise<Result<Depth>>
    getTicker(currencyPair: CurrencyPair): Promise<Result<Ticker>>
    getTrades(
        sinceMicros: number,
        currencyPair: CurrencyPair
    ): Promise<Result<Trade[]>>

    getFeeForOrder(order: Order): Promise<Result<Price>>
    executeOrder(order: SiteOrder): Promise<Result<OrderStatus>>
    cancelOrder(order: SiteOrder): Promise<Result<boolean>>
    getOpenOrders(
        userAccount?: TradeSiteUserAccount
    ): Promise<Result<SiteOrder[]>>
    getAccounts(
        userAccount?: TradeSiteUserAccount
    ): Promise<Result<TradeSiteAccount[]>>

    /** 마이크로초 단위 갱신 주기 */
    getUpdateInterval(): number
    isRequestAllowed(requestType: TradeSiteRequestType): boolean
}
