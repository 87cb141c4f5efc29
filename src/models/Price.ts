/**
 * File: src/models/Price.ts
 */

import BigNumber from "bignumber.js"
import { Currency } from "./Currency"

export interface Price {
    readonly value: BigNumber
    readonly currency: Currency
}

export function createPrice(
    value: BigNumber.Value,
    currency: Currency
): Price {
    return { value: new BigNumber(value), currency }
}
