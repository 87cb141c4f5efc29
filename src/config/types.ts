/**
 * Path: src/config/types.ts
 * Configuration 타입 정의
 */

export interface AppConfig {
    exchange: ExchangeConfig
    storage: StorageConfig
    log: LogConfig
}

export interface ExchangeConfig {
    exchange: string // Poloniex
    url: string // public api url
    timeout: number // ms
    autoRegisterCurrencies: boolean // 레지스트리에 없는 코인 자동 등록 여부
}

export interface StorageConfig {
    dataDir: string
    currencyFile: string
}

export interface LogConfig {
    level: string
    logDir?: string
}
