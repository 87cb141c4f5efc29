/**
 * Path: src/config/EnvConfigLoader.ts
 * EnvConfigLoader 구현
 */
import dotenv from "dotenv"
import { AppConfig } from "./types"
import { IConfigLoader } from "./IConfigLoader"
import { ErrorCode, ErrorSeverity, TradeSiteError } from "../errors/types"

export const DEFAULT_POLONIEX_URL = "https://poloniex.com/public"
export const DEFAULT_HTTP_TIMEOUT = 10000
export const DEFAULT_CURRENCY_FILE = "currency.lst"

export class EnvConfigLoader implements IConfigLoader {
    constructor(
        private readonly envPath?: string,
        private readonly env: NodeJS.ProcessEnv = process.env
    ) {
        if (envPath) {
            dotenv.config({ path: envPath })
        } else {
            dotenv.config()
        }
    }

    loadConfig(): AppConfig {
        const env = this.env

        return {
            exchange: {
                exchange: "Poloniex",
                url: env.POLONIEX_URL || DEFAULT_POLONIEX_URL,
                timeout: this.parsePositiveInt(
                    "HTTP_TIMEOUT",
                    env.HTTP_TIMEOUT,
                    DEFAULT_HTTP_TIMEOUT
                ),
                autoRegisterCurrencies:
                    (env.AUTO_REGISTER_CURRENCIES || "").toLowerCase() ===
                    "true",
            },
            storage: {
                dataDir: env.DATA_DIR || "./data",
                currencyFile: env.CURRENCY_FILE || DEFAULT_CURRENCY_FILE,
            },
            log: {
                level: env.LOG_LEVEL || "info",
                logDir: env.LOG_DIR || undefined,
            },
        }
    }

    private parsePositiveInt(
        name: string,
        raw: string | undefined,
        fallback: number
    ): number {
        if (raw === undefined || raw === "") return fallback

        const value = Number(raw)
        if (!Number.isInteger(value) || value <= 0) {
            throw new TradeSiteError(
                ErrorCode.INVALID_CONFIG,
                `${name} must be a positive integer, got "${raw}"`,
                undefined,
                ErrorSeverity.CRITICAL
            )
        }
        return value
    }
}
