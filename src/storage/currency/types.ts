/**
 * Path: src/storage/currency/types.ts
 */

export interface ICurrencyPersistence {
    load(): Promise<boolean>
    save(): Promise<boolean>
}
