/**
 * File: src/models/defaultCurrencies.ts
 * Description: 기본 통화 목록 로드
 */

import rawCurrencies from "../data/default-currencies.json"
import { Currency, createCurrency, isCurrencyType } from "./Currency"

export function getDefaultCurrencies(): Currency[] {
    return rawCurrencies.flatMap((entry) =>
        isCurrencyType(entry.type)
            ? [createCurrency({ ...entry, type: entry.type })]
            : []
    )
}
