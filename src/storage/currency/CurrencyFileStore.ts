/**
 * Path: src/storage/currency/CurrencyFileStore.ts
 *
 * 통화 레지스트리를 텍스트 파일로 저장/로드한다.
 * 한 줄에 통화 하나: code|name|description|type
 * 각 필드는 폼 인코딩 (공백은 "+", 영숫자와 . - * _ 외에는 %XX)
 */
import fs from "fs/promises"
import path from "path"
import { ErrorCode, TradeSiteError, toError } from "../../errors/types"
import { Currency, createCurrency, isCurrencyType } from "../../models/Currency"
import { CurrencyRegistry } from "../../models/CurrencyRegistry"
import { ILogger, Logger } from "../../utils/logger"
import { ICurrencyPersistence } from "./types"

export const DEFAULT_CURRENCY_FILENAME = "currency.lst"
const FIELD_SEPARATOR = "|"

export interface CurrencyFileStoreOptions {
    filename?: string
    logger?: ILogger
}

// encodeURIComponent 가 그대로 두는 문자 중 폼 인코딩에서 이스케이프하는 것
const FORM_RESERVED = /[!'()~]/g

function encodeFormField(value: string): string {
    return encodeURIComponent(value)
        .replace(
            FORM_RESERVED,
            (char) => `%${char.charCodeAt(0).toString(16).toUpperCase()}`
        )
        .replace(/%20/g, "+")
}

function decodeFormField(value: string): string {
    return decodeURIComponent(value.replace(/\+/g, " "))
}

/** 인코딩할 수 없는 문자열(짝 없는 서로게이트)이면 URIError 를 던진다 */
export function formatCurrencyLine(currency: Currency): string {
    return [
        currency.code,
        currency.name,
        currency.description,
        currency.type,
    ]
        .map(encodeFormField)
        .join(FIELD_SEPARATOR)
}

/** 잘못된 줄이면 사유를 담은 에러를 던진다 */
export function parseCurrencyLine(line: string): Currency {
    const fields = line.split(FIELD_SEPARATOR)
    if (fields.length !== 4) {
        throw new TradeSiteError(
            ErrorCode.PERSISTENCE_FORMAT_ERROR,
            `Expected 4 fields, got ${fields.length}`
        )
    }

    let decoded: string[]
    try {
        decoded = fields.map(decodeFormField)
    } catch (error) {
        throw new TradeSiteError(
            ErrorCode.PERSISTENCE_FORMAT_ERROR,
            "Invalid percent-encoding",
            toError(error)
        )
    }

    const [code, name, description, type] = decoded
    if (!code) {
        throw new TradeSiteError(
            ErrorCode.PERSISTENCE_FORMAT_ERROR,
            "Missing currency code"
        )
    }
    if (!isCurrencyType(type)) {
        throw new TradeSiteError(
            ErrorCode.PERSISTENCE_FORMAT_ERROR,
            `Unknown currency type "${type}"`
        )
    }

    return createCurrency({ code, name, description, type })
}

export class CurrencyFileStore implements ICurrencyPersistence {
    private readonly filename: string
    private readonly logger: ILogger

    constructor(
        private readonly registry: CurrencyRegistry,
        private readonly dataDir: string,
        options: CurrencyFileStoreOptions = {}
    ) {
        this.filename = options.filename ?? DEFAULT_CURRENCY_FILENAME
        this.logger = options.logger ?? Logger.getInstance("CurrencyFileStore")
    }

    getFilePath(): string {
        return path.join(this.dataDir, this.filename)
    }

    /** 파일 전체를 덮어쓴다 */
    async save(): Promise<boolean> {
        let content: string
        try {
            content = this.registry
                .getRegisteredCurrencies()
                .map((currency) => `${formatCurrencyLine(currency)}\n`)
                .join("")
        } catch (error) {
            this.logger.error(
                "Cannot encode currencies for storage",
                new TradeSiteError(
                    ErrorCode.PERSISTENCE_FORMAT_ERROR,
                    "Currency field is not encodable",
                    toError(error)
                )
            )
            return false
        }

        try {
            await fs.writeFile(this.getFilePath(), content, "utf8")
            return true
        } catch (error) {
            this.logger.error(
                `Cannot open file to store currencies: ${this.getFilePath()}`,
                new TradeSiteError(
                    ErrorCode.PERSISTENCE_IO_FAILURE,
                    "Currency file write failed",
                    toError(error)
                )
            )
            return false
        }
    }

    async load(): Promise<boolean> {
        let content: string
        try {
            content = await fs.readFile(this.getFilePath(), "utf8")
        } catch (error) {
            this.logger.error(
                `Cannot read currency file: ${this.getFilePath()}`,
                new TradeSiteError(
                    ErrorCode.PERSISTENCE_IO_FAILURE,
                    "Currency file read failed",
                    toError(error)
                )
            )
            return false
        }

        let loaded = 0
        content.split(/\r?\n/).forEach((line, index) => {
            if (line.trim() === "") return

            try {
                if (this.registry.register(parseCurrencyLine(line))) loaded++
            } catch (error) {
                this.logger.warn("Skipping malformed currency line", {
                    file: this.getFilePath(),
                    line: index + 1,
                    reason: toError(error).message,
                })
            }
        })

        this.logger.debug("Loaded currencies", {
            file: this.getFilePath(),
            count: loaded,
        })
        return true
    }
}
