/**
 * File: src/models/CurrencyPair.ts
 */

import { Currency } from "./Currency"

export class CurrencyPair {
    constructor(
        public readonly currency: Currency, // 거래 대상 통화
        public readonly paymentCurrency: Currency // 결제 통화
    ) {
        Object.freeze(this)
    }

    equals(other: CurrencyPair): boolean {
        return (
            this.currency.code === other.currency.code &&
            this.paymentCurrency.code === other.paymentCurrency.code
        )
    }

    toString(): string {
        return `${this.currency.code}/${this.paymentCurrency.code}`
    }
}
