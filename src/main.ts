/**
 * Path: src/main.ts
 * Purpose: 설정 로드, 통화 레지스트리 준비 후 한 마켓의 시세/호가 조회
 *
 * 사용법: node dist/main.js [BTC_XMR]
 */

import fs from "fs/promises"
import { AppConfig } from "./config/types"
import { EnvConfigLoader } from "./config/EnvConfigLoader"
import { PoloniexClient } from "./exchanges/poloniex/PoloniexClient"
import { convertPoloniexPairName } from "./exchanges/poloniex/types"
import { CurrencyPair } from "./models/CurrencyPair"
import { CurrencyRegistry } from "./models/CurrencyRegistry"
import { getDefaultCurrencies } from "./models/defaultCurrencies"
import { isOk } from "./types/result"
import { CurrencyFileStore } from "./storage/currency/CurrencyFileStore"
import { ILogger, Logger } from "./utils/logger"

class Application {
    constructor(
        private readonly config: AppConfig,
        private readonly logger: ILogger
    ) {}

    static create(envPath?: string): Application {
        const config = new EnvConfigLoader(envPath).loadConfig()
        Logger.configure(config.log)
        return new Application(config, Logger.getInstance("Application"))
    }

    async run(pairName: string): Promise<number> {
        const registry = new CurrencyRegistry()
        const store = await this.prepareRegistry(registry)

        const client = await PoloniexClient.create({
            config: this.config.exchange,
            registry,
        })

        const pair = this.findPair(client, pairName)
        if (!pair) {
            this.logger.error(`Unknown currency pair: ${pairName}`)
            await store.save()
            return 1
        }

        const ticker = await client.getTicker(pair)
        if (isOk(ticker)) {
            this.logger.info(`Ticker ${pair}`, {
                last: ticker.value.last.toString(),
                bid: ticker.value.bid.toString(),
                ask: ticker.value.ask.toString(),
                volume: ticker.value.volume.toString(),
            })
        } else {
            this.logger.warn(`Ticker ${pair} unavailable`, {
                status: ticker.status,
                reason:
                    ticker.status === "failure"
                        ? ticker.error.toString()
                        : ticker.message,
            })
        }

        const depth = await client.getDepth(pair)
        if (isOk(depth)) {
            this.logger.info(`Depth ${pair}`, {
                asks: depth.value.asks.length,
                bids: depth.value.bids.length,
                bestAsk: depth.value.asks[0]?.price.toString(),
                bestBid: depth.value.bids[0]?.price.toString(),
            })
        } else {
            this.logger.warn(`Depth ${pair} unavailable`, {
                status: depth.status,
                reason:
                    depth.status === "failure"
                        ? depth.error.toString()
                        : depth.message,
            })
        }

        const saved = await store.save()
        return isOk(ticker) && isOk(depth) && saved ? 0 : 1
    }

    private async prepareRegistry(
        registry: CurrencyRegistry
    ): Promise<CurrencyFileStore> {
        const { dataDir, currencyFile } = this.config.storage
        await fs.mkdir(dataDir, { recursive: true })

        const store = new CurrencyFileStore(registry, dataDir, {
            filename: currencyFile,
        })

        // 저장된 목록이 없으면 기본 통화로 시작
        if (!(await store.load()) || registry.size() === 0) {
            const added = registry.registerAll(getDefaultCurrencies())
            this.logger.info("Registered default currencies", {
                count: added.length,
            })
        }
        return store
    }

    private findPair(
        client: PoloniexClient,
        pairName: string
    ): CurrencyPair | undefined {
        const names = convertPoloniexPairName.fromPairName(pairName)
        if (!names) return undefined

        return client
            .getSupportedCurrencyPairs()
            .find(
                (pair) =>
                    client.getPairName(pair) ===
                    convertPoloniexPairName.toPairName(names.base, names.quote)
            )
    }
}

if (require.main === module) {
    Application.create()
        .run(process.argv[2] ?? "BTC_XMR")
        .then((code) => {
            process.exitCode = code
        })
        .catch((error) => {
            console.error("Fatal error occurred", error)
            process.exitCode = 1
        })
}
