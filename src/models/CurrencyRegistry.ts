/**
 * File: src/models/CurrencyRegistry.ts
 * Description: 통화 코드 → 통화 정보 레지스트리
 *
 * 등록된 통화는 교체되거나 삭제되지 않는다. 같은 코드로 다시 등록하면 무시된다.
 */

import { Currency, CurrencyInput, createCurrency } from "./Currency"

export class CurrencyRegistry {
    private readonly currencies = new Map<string, Currency>()

    constructor(initial: Iterable<Currency> = []) {
        this.registerAll(initial)
    }

    public register(currency: Currency): boolean {
        const code = currency.code.toUpperCase()
        if (!code || this.currencies.has(code)) return false

        this.currencies.set(
            code,
            code === currency.code ? currency : createCurrency(currency)
        )
        return true
    }

    /** 새로 등록된 통화만 반환 */
    public registerAll(currencies: Iterable<Currency>): Currency[] {
        const added: Currency[] = []
        for (const currency of currencies) {
            if (this.register(currency)) {
                added.push(this.getCurrencyForCode(currency.code) ?? currency)
            }
        }
        return added
    }

    public registerInput(input: CurrencyInput): Currency {
        const currency = createCurrency(input)
        this.register(currency)
        return this.currencies.get(currency.code) ?? currency
    }

    public getCurrencyForCode(code: string): Currency | undefined {
        return this.currencies.get(code.toUpperCase())
    }

    public hasCurrency(code: string): boolean {
        return this.currencies.has(code.toUpperCase())
    }

    public getRegisteredCurrencies(): Currency[] {
        return Array.from(this.currencies.values())
    }

    public size(): number {
        return this.currencies.size
    }
}
