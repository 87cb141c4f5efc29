/**
 * Path: src/exchanges/poloniex/PoloniexDepthConverter.ts
 */
import BigNumber from "bignumber.js"
import { ExchangeConfig } from "../../config/types"
import { ErrorCode, TradeSiteError } from "../../errors/types"
import { CurrencyPair } from "../../models/CurrencyPair"
import { Depth, DepthEntry } from "../common/types"
import { PoloniexDepthLevel, isOrderBookResponse } from "./types"

function toDepthEntry([price, amount]: PoloniexDepthLevel): DepthEntry {
    return { price: new BigNumber(price), amount: new BigNumber(amount) }
}

function byPrice(a: DepthEntry, b: DepthEntry): number {
    if (a.price.isLessThan(b.price)) return -1
    if (a.price.isGreaterThan(b.price)) return 1
    return 0
}

export class PoloniexDepthConverter {
    static convert(
        config: ExchangeConfig,
        rawData: unknown,
        currencyPair: CurrencyPair
    ): Depth {
        if (!isOrderBookResponse(rawData)) {
            throw new TradeSiteError(
                ErrorCode.DATA_NOT_AVAILABLE,
                `Invalid ${config.exchange} order book for ${currencyPair}`
            )
        }

        return {
            exchange: config.exchange,
            currencyPair,
            timestamp: Date.now(), // 응답에 타임스탬프 없음
            asks: rawData.asks
                .map(toDepthEntry)
                .sort(byPrice),
            bids: rawData.bids
                .map(toDepthEntry)
                .sort((a, b) => byPrice(b, a)),
            isFrozen: rawData.isFrozen === "1",
            sequence: rawData.seq,
        }
    }
}
