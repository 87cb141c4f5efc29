/**
 * File: src/models/Order.ts
 * Description: 수수료 계산에 쓰이는 주문 모델
 */

import BigNumber from "bignumber.js"
import { Currency } from "./Currency"
import { CurrencyPair } from "./CurrencyPair"

export enum OrderType {
    BUY = "BUY",
    SELL = "SELL",
    DEPOSIT = "DEPOSIT",
    WITHDRAW = "WITHDRAW",
}

export enum OrderStatus {
    UNKNOWN = "UNKNOWN",
    PARTIALLY_FILLED = "PARTIALLY_FILLED",
    FILLED = "FILLED",
    CANCELED = "CANCELED",
    ERROR = "ERROR",
}

interface OrderBase {
    readonly id?: string
    readonly currencyPair: CurrencyPair
    readonly amount: BigNumber
}

/** 거래소 주문 (매수/매도) */
export interface SiteOrder extends OrderBase {
    readonly kind: "site"
    readonly orderType: OrderType
    readonly price: BigNumber
}

/** 출금 주문 */
export interface WithdrawOrder extends OrderBase {
    readonly kind: "withdraw"
    readonly currency: Currency
    readonly account?: string // 출금 대상 계좌
}

/** 입금 주문 */
export interface DepositOrder extends OrderBase {
    readonly kind: "deposit"
    readonly currency: Currency
    readonly account?: string
}

export type Order = SiteOrder | WithdrawOrder | DepositOrder

export function createSiteOrder(params: {
    orderType: OrderType
    currencyPair: CurrencyPair
    amount: BigNumber.Value
    price: BigNumber.Value
    id?: string
}): SiteOrder {
    return {
        kind: "site",
        id: params.id,
        orderType: params.orderType,
        currencyPair: params.currencyPair,
        amount: new BigNumber(params.amount),
        price: new BigNumber(params.price),
    }
}

export function createWithdrawOrder(params: {
    currencyPair: CurrencyPair
    amount: BigNumber.Value
    account?: string
}): WithdrawOrder {
    return {
        kind: "withdraw",
        currencyPair: params.currencyPair,
        currency: params.currencyPair.currency,
        amount: new BigNumber(params.amount),
        account: params.account,
    }
}

export function createDepositOrder(params: {
    currencyPair: CurrencyPair
    amount: BigNumber.Value
    account?: string
}): DepositOrder {
    return {
        kind: "deposit",
        currencyPair: params.currencyPair,
        currency: params.currencyPair.currency,
        amount: new BigNumber(params.amount),
        account: params.account,
    }
}
