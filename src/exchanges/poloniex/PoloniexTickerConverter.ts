/**
 * Path: src/exchanges/poloniex/PoloniexTickerConverter.ts
 */
import BigNumber from "bignumber.js"
import { ExchangeConfig } from "../../config/types"
import { ErrorCode, TradeSiteError } from "../../errors/types"
import { CurrencyPair } from "../../models/CurrencyPair"
import { Ticker } from "../common/types"
import { isRecord, isTickerEntry } from "./types"

export class PoloniexTickerConverter {
    /** 전체 마켓 응답에서 요청한 마켓만 골라 변환 */
    static convert(
        config: ExchangeConfig,
        rawData: unknown,
        currencyPair: CurrencyPair,
        pairName: string
    ): Ticker {
        if (!isRecord(rawData) || !(pairName in rawData)) {
            throw new TradeSiteError(
                ErrorCode.DATA_NOT_AVAILABLE,
                `No ${pairName} entry in ${config.exchange} ticker response`
            )
        }

        const entry = rawData[pairName]
        if (!isTickerEntry(entry)) {
            throw new TradeSiteError(
                ErrorCode.DATA_NOT_AVAILABLE,
                `Invalid ${config.exchange} ticker entry for ${pairName}`
            )
        }

        return {
            exchange: config.exchange,
            currencyPair,
            timestamp: Date.now(),
            last: new BigNumber(entry.last),
            ask: new BigNumber(entry.lowestAsk),
            bid: new BigNumber(entry.highestBid),
            high:
                entry.high24hr !== undefined
                    ? new BigNumber(entry.high24hr)
                    : undefined,
            low:
                entry.low24hr !== undefined
                    ? new BigNumber(entry.low24hr)
                    : undefined,
            volume: new BigNumber(entry.baseVolume),
            quoteVolume: new BigNumber(entry.quoteVolume),
            percentChange: new BigNumber(entry.percentChange),
            isFrozen: entry.isFrozen === "1",
        }
    }
}
