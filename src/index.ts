/**
 * Path: src/index.ts
 */
export * from "./errors/types"
export * from "./types/result"
export * from "./config/types"
export { IConfigLoader } from "./config/IConfigLoader"
export { EnvConfigLoader } from "./config/EnvConfigLoader"
export * from "./models/Currency"
export { CurrencyPair } from "./models/CurrencyPair"
export { CurrencyRegistry } from "./models/CurrencyRegistry"
export { getDefaultCurrencies } from "./models/defaultCurrencies"
export * from "./models/Order"
export * from "./models/Price"
export * from "./exchanges/common/types"
export * from "./exchanges/common/defaults"
export { IExchangeClient } from "./exchanges/IExchangeClient"
export {
    PoloniexClient,
    PoloniexClientOptions,
} from "./exchanges/poloniex/PoloniexClient"
export { convertPoloniexPairName } from "./exchanges/poloniex/types"
export { ICurrencyPersistence } from "./storage/currency/types"
export * from "./storage/currency/CurrencyFileStore"
export { AxiosHttpClient, IHttpClient, HttpClientOptions } from "./utils/http"
export { Logger, ILogger, LoggerOptions } from "./utils/logger"
