/**
 * Path: tests/storage/CurrencyFileStore.test.ts
 */
import fs from "fs/promises"
import os from "os"
import path from "path"
import { ErrorCode, TradeSiteError } from "../../src/errors/types"
import { CurrencyType, createCurrency } from "../../src/models/Currency"
import { CurrencyRegistry } from "../../src/models/CurrencyRegistry"
import {
    CurrencyFileStore,
    formatCurrencyLine,
    parseCurrencyLine,
} from "../../src/storage/currency/CurrencyFileStore"
import { ILogger } from "../../src/utils/logger"
import { createMockLogger } from "../helpers/mockLogger"

describe("CurrencyFileStore", () => {
    let dataDir: string
    let logger: jest.Mocked<ILogger>

    beforeEach(async () => {
        dataDir = await fs.mkdtemp(path.join(os.tmpdir(), "currency-store-"))
        logger = createMockLogger()
    })

    afterEach(async () => {
        await fs.rm(dataDir, { recursive: true, force: true })
    })

    test("writes one form-encoded line per currency", async () => {
        const registry = new CurrencyRegistry([
            createCurrency({
                code: "BTC",
                name: "Bitcoin",
                description: "Digital gold",
            }),
            createCurrency({
                code: "EUR",
                name: "Euro|EU",
                type: CurrencyType.FIAT,
            }),
        ])
        const store = new CurrencyFileStore(registry, dataDir, { logger })

        expect(await store.save()).toBe(true)

        const content = await fs.readFile(
            path.join(dataDir, "currency.lst"),
            "utf8"
        )
        expect(content).toBe(
            "BTC|Bitcoin|Digital+gold|CRYPTO\nEUR|Euro%7CEU||FIAT\n"
        )
    })

    test("load restores what save wrote", async () => {
        const currencies = [
            createCurrency({
                code: "PLN",
                name: "Złoty",
                description: "pipe | inside | text",
                type: CurrencyType.FIAT,
            }),
            createCurrency({ code: "JPY", name: "円", type: CurrencyType.FIAT }),
            createCurrency({ code: "A|B", name: "", description: "" }),
            createCurrency({
                code: "XMR",
                name: "Monero",
                description: "100% private, 50/50 & more",
            }),
            createCurrency({
                code: "CPP",
                name: "C++ (coin)",
                description: "it's ~1+1 !",
            }),
        ]
        const source = new CurrencyRegistry(currencies)
        expect(
            await new CurrencyFileStore(source, dataDir, { logger }).save()
        ).toBe(true)

        const target = new CurrencyRegistry()
        const loaded = await new CurrencyFileStore(target, dataDir, {
            logger,
        }).load()

        expect(loaded).toBe(true)
        expect(target.getRegisteredCurrencies()).toEqual(currencies)
        expect(logger.warn).not.toHaveBeenCalled()
    })

    test("skips malformed lines and keeps the valid ones", async () => {
        await fs.writeFile(
            path.join(dataDir, "currency.lst"),
            [
                "BTC|Bitcoin|x|CRYPTO",
                "bad line",
                "ETH|Ether|%E0%A4%A|CRYPTO",
                "|nameless|d|CRYPTO",
                "DOGE|Doge||STOCK",
                "",
            ].join("\n"),
            "utf8"
        )
        const registry = new CurrencyRegistry()

        const loaded = await new CurrencyFileStore(registry, dataDir, {
            logger,
        }).load()

        expect(loaded).toBe(true)
        expect(registry.getRegisteredCurrencies().map((c) => c.code)).toEqual([
            "BTC",
        ])
        expect(logger.warn).toHaveBeenCalledTimes(4)
        expect(logger.warn).toHaveBeenCalledWith(
            "Skipping malformed currency line",
            {
                file: path.join(dataDir, "currency.lst"),
                line: 2,
                reason: "Expected 4 fields, got 1",
            }
        )
    })

    test("does not overwrite currencies already registered", async () => {
        await fs.writeFile(
            path.join(dataDir, "coins.lst"),
            "BTC|Bitcoin||CRYPTO\n",
            "utf8"
        )
        const registry = new CurrencyRegistry([
            createCurrency({ code: "BTC", name: "Existing" }),
        ])

        await new CurrencyFileStore(registry, dataDir, {
            filename: "coins.lst",
            logger,
        }).load()

        expect(registry.getCurrencyForCode("BTC")?.name).toBe("Existing")
    })

    test("loads a file written with form encoding", async () => {
        await fs.writeFile(
            path.join(dataDir, "currency.lst"),
            "USD|US+Dollar|%28test%29+x|FIAT\nXMR|Monero|a%2Bb|CRYPTO\n",
            "utf8"
        )
        const registry = new CurrencyRegistry()

        await new CurrencyFileStore(registry, dataDir, { logger }).load()

        expect(registry.getCurrencyForCode("USD")).toEqual(
            createCurrency({
                code: "USD",
                name: "US Dollar",
                description: "(test) x",
                type: CurrencyType.FIAT,
            })
        )
        expect(registry.getCurrencyForCode("XMR")?.description).toBe("a+b")
    })

    test("reports an unencodable currency without writing the file", async () => {
        const store = new CurrencyFileStore(
            new CurrencyRegistry([
                createCurrency({ code: "BAD", name: "broken \uD800" }),
            ]),
            dataDir,
            { logger }
        )

        expect(await store.save()).toBe(false)
        expect(logger.error).toHaveBeenCalledTimes(1)
        const [message, error] = logger.error.mock.calls[0]
        expect(message).toBe("Cannot encode currencies for storage")
        expect(error).toBeInstanceOf(TradeSiteError)
        if (error instanceof TradeSiteError) {
            expect(error.code).toBe(ErrorCode.PERSISTENCE_FORMAT_ERROR)
        }
        await expect(fs.access(store.getFilePath())).rejects.toThrow()
    })

    test("reports a missing file as a failed load", async () => {
        const store = new CurrencyFileStore(new CurrencyRegistry(), dataDir, {
            logger,
        })

        expect(await store.load()).toBe(false)
        expect(logger.error).toHaveBeenCalledTimes(1)
    })

    test("reports an unwritable location as a failed save", async () => {
        const store = new CurrencyFileStore(
            new CurrencyRegistry([createCurrency({ code: "BTC" })]),
            path.join(dataDir, "missing", "dir"),
            { logger }
        )

        expect(await store.save()).toBe(false)
        expect(logger.error).toHaveBeenCalledTimes(1)
        const [, error] = logger.error.mock.calls[0]
        expect(error).toBeInstanceOf(TradeSiteError)
        if (error instanceof TradeSiteError) {
            expect(error.code).toBe(ErrorCode.PERSISTENCE_IO_FAILURE)
        }
    })
})

describe("currency line format", () => {
    test("formats and parses a single line", () => {
        const currency = createCurrency({
            code: "USD",
            name: "US Dollar",
            description: "",
            type: CurrencyType.FIAT,
        })

        expect(formatCurrencyLine(currency)).toBe("USD|US+Dollar||FIAT")
        expect(parseCurrencyLine("USD|US+Dollar||FIAT")).toEqual(currency)
    })

    test("escapes the characters form encoding reserves", () => {
        const currency = createCurrency({
            code: "X",
            name: "a+b (c)!'~*",
            description: "",
        })

        expect(formatCurrencyLine(currency)).toBe(
            "X|a%2Bb+%28c%29%21%27%7E*||CRYPTO"
        )
    })

    test("tags malformed lines as format errors", () => {
        expect.assertions(2)
        try {
            parseCurrencyLine("BTC|Bitcoin")
        } catch (error) {
            expect(error).toBeInstanceOf(TradeSiteError)
            if (error instanceof TradeSiteError) {
                expect(error.code).toBe(ErrorCode.PERSISTENCE_FORMAT_ERROR)
            }
        }
    })

    test("rejects an unknown type", () => {
        expect(() => parseCurrencyLine("BTC|Bitcoin||COMMODITY")).toThrow(
            'Unknown currency type "COMMODITY"'
        )
    })
})
