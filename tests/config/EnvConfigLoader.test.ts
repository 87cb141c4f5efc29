/**
 * Path: tests/config/EnvConfigLoader.test.ts
 */
import { EnvConfigLoader } from "../../src/config/EnvConfigLoader"
import { ErrorCode, TradeSiteError } from "../../src/errors/types"

describe("EnvConfigLoader", () => {
    test("uses defaults when nothing is set", () => {
        const config = new EnvConfigLoader(undefined, {}).loadConfig()

        expect(config).toEqual({
            exchange: {
                exchange: "Poloniex",
                url: "https://poloniex.com/public",
                timeout: 10000,
                autoRegisterCurrencies: false,
            },
            storage: {
                dataDir: "./data",
                currencyFile: "currency.lst",
            },
            log: {
                level: "info",
                logDir: undefined,
            },
        })
    })

    test("reads overrides from the environment", () => {
        const config = new EnvConfigLoader(undefined, {
            POLONIEX_URL: "http://localhost:8080/public",
            HTTP_TIMEOUT: "2500",
            DATA_DIR: "/var/lib/trade",
            CURRENCY_FILE: "coins.lst",
            AUTO_REGISTER_CURRENCIES: "TRUE",
            LOG_LEVEL: "debug",
            LOG_DIR: "/var/log/trade",
        }).loadConfig()

        expect(config.exchange.url).toBe("http://localhost:8080/public")
        expect(config.exchange.timeout).toBe(2500)
        expect(config.exchange.autoRegisterCurrencies).toBe(true)
        expect(config.storage).toEqual({
            dataDir: "/var/lib/trade",
            currencyFile: "coins.lst",
        })
        expect(config.log).toEqual({ level: "debug", logDir: "/var/log/trade" })
    })

    test.each(["abc", "0", "-5", "1.5"])(
        "rejects HTTP_TIMEOUT=%p",
        (value) => {
            const loader = new EnvConfigLoader(undefined, {
                HTTP_TIMEOUT: value,
            })

            expect(() => loader.loadConfig()).toThrow(TradeSiteError)
            try {
                loader.loadConfig()
            } catch (error) {
                expect(error instanceof TradeSiteError && error.code).toBe(
                    ErrorCode.INVALID_CONFIG
                )
            }
        }
    )
})
