/**
 * Path: src/exchanges/poloniex/PoloniexClient.ts
 *
 * Poloniex public API 클라이언트.
 * 호가/시세/지원 마켓 조회만 구현되어 있고 주문 관련 기능은 notImplemented 를 반환한다.
 */
import { Queue } from "async-await-queue"
import BigNumber from "bignumber.js"
import { ExchangeConfig } from "../../config/types"
import { ErrorCode, TradeSiteError, toError } from "../../errors/types"
import { Currency, CurrencyType } from "../../models/Currency"
import { CurrencyPair } from "../../models/CurrencyPair"
import { CurrencyRegistry } from "../../models/CurrencyRegistry"
import {
    Order,
    OrderStatus,
    OrderType,
    SiteOrder,
} from "../../models/Order"
import { Price, createPrice } from "../../models/Price"
import {
    Failure,
    Result,
    failure,
    notImplemented,
    ok,
} from "../../types/result"
import { AxiosHttpClient, IHttpClient } from "../../utils/http"
import { ILogger, Logger } from "../../utils/logger"
import { IExchangeClient } from "../IExchangeClient"
import {
    allowAllRequests,
    DEFAULT_UPDATE_INTERVAL_MICROS,
} from "../common/defaults"
import {
    Depth,
    Ticker,
    Trade,
    TradeSiteAccount,
    TradeSiteRequestType,
    TradeSiteUserAccount,
} from "../common/types"
import { PoloniexDepthConverter } from "./PoloniexDepthConverter"
import { PoloniexTickerConverter } from "./PoloniexTickerConverter"
import { convertPoloniexPairName, isPoloniexError, isRecord } from "./types"

export interface PoloniexClientOptions {
    config: ExchangeConfig
    registry: CurrencyRegistry
    httpClient?: IHttpClient
    logger?: ILogger
    // 주문 실행/수수료 계산 직렬화 큐 (기본: 동시성 1)
    orderQueue?: Queue
}

export class PoloniexClient implements IExchangeClient {
    // 매수/매도 모두 0.2%
    static readonly TRADE_FEE_RATE = new BigNumber("0.002")

    private readonly config: ExchangeConfig
    private readonly registry: CurrencyRegistry
    private readonly httpClient: IHttpClient
    private readonly logger: ILogger
    // 주문 실행과 수수료 계산은 한 번에 하나씩
    private readonly orderQueue: Queue
    private supportedCurrencyPairs: CurrencyPair[] = []

    private constructor(options: PoloniexClientOptions) {
        this.config = options.config
        this.registry = options.registry
        this.httpClient =
            options.httpClient ??
            new AxiosHttpClient({ timeout: options.config.timeout })
        this.logger = options.logger ?? Logger.getInstance("PoloniexClient")
        this.orderQueue = options.orderQueue ?? new Queue(1, 0)
    }

    /** 지원 마켓 조회까지 마친 클라이언트 생성. 조회에 실패해도 클라이언트는 반환된다. */
    static async create(
        options: PoloniexClientOptions
    ): Promise<PoloniexClient> {
        const client = new PoloniexClient(options)

        if (!(await client.requestSupportedCurrencyPairs())) {
            client.logger.error(
                `Cannot fetch the supported currency pairs for ${client.getName()}`
            )
        }
        return client
    }

    getName(): string {
        return this.config.exchange
    }

    getSupportedCurrencyPairs(): CurrencyPair[] {
        return [...this.supportedCurrencyPairs]
    }

    isSupportedCurrencyPair(currencyPair: CurrencyPair): boolean {
        return this.supportedCurrencyPairs.some((pair) =>
            pair.equals(currencyPair)
        )
    }

    refreshSupportedCurrencyPairs(): Promise<boolean> {
        return this.requestSupportedCurrencyPairs()
    }

    async getDepth(currencyPair: CurrencyPair): Promise<Result<Depth>> {
        if (!this.isSupportedCurrencyPair(currencyPair)) {
            return this.unsupportedPair(currencyPair)
        }

        const url = `${this.config.url}?command=returnOrderBook&currencyPair=${this.getPairName(currencyPair)}`

        return this.fetchAndConvert("depth", url, (data) =>
            PoloniexDepthConverter.convert(this.config, data, currencyPair)
        )
    }

    async getTicker(currencyPair: CurrencyPair): Promise<Result<Ticker>> {
        if (!this.isSupportedCurrencyPair(currencyPair)) {
            return this.unsupportedPair(currencyPair)
        }

        // 전체 마켓 시세가 한 번에 내려오므로 마켓 파라미터 없음
        const url = `${this.config.url}?command=returnTicker`

        const pairName = this.getPairName(currencyPair)

        return this.fetchAndConvert("ticker", url, (data) =>
            PoloniexTickerConverter.convert(
                this.config,
                data,
                currencyPair,
                pairName
            )
        )
    }

    async getTrades(
        _sinceMicros: number,
        _currencyPair: CurrencyPair
    ): Promise<Result<Trade[]>> {
        return notImplemented("Getting the trades", this.getName())
    }

    getFeeForOrder(order: Order): Promise<Result<Price>> {
        return this.exclusive(() => this.computeFee(order))
    }

    executeOrder(_order: SiteOrder): Promise<Result<OrderStatus>> {
        return this.exclusive(() =>
            notImplemented("Executing an order", this.getName())
        )
    }

    async cancelOrder(_order: SiteOrder): Promise<Result<boolean>> {
        return notImplemented("Cancelling an order", this.getName())
    }

    async getOpenOrders(
        _userAccount?: TradeSiteUserAccount
    ): Promise<Result<SiteOrder[]>> {
        return notImplemented("Getting the open orders", this.getName())
    }

    async getAccounts(
        _userAccount?: TradeSiteUserAccount
    ): Promise<Result<TradeSiteAccount[]>> {
        return notImplemented("Getting the accounts", this.getName())
    }

    getUpdateInterval(): number {
        return DEFAULT_UPDATE_INTERVAL_MICROS
    }

    isRequestAllowed(requestType: TradeSiteRequestType): boolean {
        return allowAllRequests(requestType)
    }

    /** 폴로닉스 마켓 이름 (예: BTC_NXT) */
    getPairName(currencyPair: CurrencyPair): string {
        return convertPoloniexPairName.toPairName(
            currencyPair.currency.code,
            currencyPair.paymentCurrency.code
        )
    }

    private computeFee(order: Order): Result<Price> {
        switch (order.kind) {
            case "withdraw":
            case "deposit":
                // 입출금 수수료 없음
                return ok(createPrice(0, order.currencyPair.currency))
            case "site":
                return this.computeTradeFee(order)
        }
    }

    private computeTradeFee(order: SiteOrder): Result<Price> {
        const rate = PoloniexClient.TRADE_FEE_RATE

        if (order.orderType === OrderType.BUY) {
            return ok(
                createPrice(
                    order.amount.multipliedBy(rate),
                    order.currencyPair.currency
                )
            )
        }

        if (order.orderType === OrderType.SELL) {
            return ok(
                createPrice(
                    order.amount.multipliedBy(order.price).multipliedBy(rate),
                    order.currencyPair.paymentCurrency
                )
            )
        }

        return failure(
            ErrorCode.UNKNOWN_ORDER_TYPE,
            `Cannot compute the ${this.getName()} fee for order type ${order.orderType}`
        )
    }

    private async exclusive<T>(job: () => T | Promise<T>): Promise<T> {
        const me = Symbol()
        await this.orderQueue.wait(me, 0)
        try {
            return await job()
        } finally {
            this.orderQueue.end(me)
        }
    }

    private unsupportedPair(currencyPair: CurrencyPair): Failure {
        return failure(
            ErrorCode.CURRENCY_NOT_SUPPORTED,
            `Currency pair: ${currencyPair} is currently not supported on ${this.getName()}`
        )
    }

    private async fetchAndConvert<T>(
        label: "depth" | "ticker",
        url: string,
        convert: (data: unknown) => T
    ): Promise<Result<T>> {
        const body = await this.httpClient.get(url)

        if (body === null) {
            return failure(
                ErrorCode.DATA_NOT_AVAILABLE,
                `${this.getName()} server did not respond to ${label} request`
            )
        }

        try {
            const data: unknown = JSON.parse(body)

            // 오류 시 {"error": "..."} 형태로 응답
            if (isPoloniexError(data)) {
                throw new TradeSiteError(
                    ErrorCode.DATA_NOT_AVAILABLE,
                    `${this.getName()} returned an error: ${data.error}`
                )
            }

            return ok(convert(data))
        } catch (error) {
            this.logger.error(
                `Cannot parse ${this.getName()} ${label} return`,
                error
            )
            return failure(
                ErrorCode.DATA_NOT_AVAILABLE,
                `cannot parse ${label} data from ${this.getName()}`,
                toError(error)
            )
        }
    }

    /**
     * 별도의 마켓 목록 API가 없어 return24hVolume 응답의 키로 지원 마켓을 구한다.
     * 전체 응답 파싱에 실패하면 기존 목록을 유지한다.
     */
    private async requestSupportedCurrencyPairs(): Promise<boolean> {
        const url = `${this.config.url}?command=return24hVolume`
        const body = await this.httpClient.get(url)

        if (body === null) {
            this.logger.error(
                `Error while fetching the ${this.getName()} supported currency pairs. Server returned no reply.`
            )
            return false
        }

        let data: unknown
        try {
            data = JSON.parse(body)
        } catch (error) {
            this.logger.error(
                `Cannot parse ${this.getName()} market 24h volumes return to get supported currency pairs`,
                error
            )
            return false
        }

        if (!isRecord(data) || isPoloniexError(data)) {
            this.logger.error(
                `Unexpected ${this.getName()} market 24h volumes return`,
                { body }
            )
            return false
        }

        const pairs: CurrencyPair[] = []
        for (const pairName of Object.keys(data)) {
            // totalBTC 등 합계 항목은 건너뜀
            if (!pairName.includes("_")) continue

            const pair = this.toCurrencyPair(pairName)
            if (pair) pairs.push(pair)
        }

        this.supportedCurrencyPairs = pairs
        this.logger.info(`Fetched ${this.getName()} supported currency pairs`, {
            count: pairs.length,
        })
        return true
    }

    private toCurrencyPair(pairName: string): CurrencyPair | null {
        const names = convertPoloniexPairName.fromPairName(pairName)
        if (!names) {
            this.logger.warn("Skipping malformed currency pair name", {
                pairName,
            })
            return null
        }

        const currency = this.resolveCurrency(names.base)
        const paymentCurrency = this.resolveCurrency(names.quote)
        if (!currency || !paymentCurrency) {
            this.logger.warn("Skipping currency pair with unknown currency", {
                pairName,
            })
            return null
        }

        return new CurrencyPair(currency, paymentCurrency)
    }

    private resolveCurrency(code: string): Currency | undefined {
        const currency = this.registry.getCurrencyForCode(code)
        if (currency || !this.config.autoRegisterCurrencies) return currency

        return this.registry.registerInput({
            code,
            name: code.toUpperCase(),
            type: CurrencyType.CRYPTO,
        })
    }
}
