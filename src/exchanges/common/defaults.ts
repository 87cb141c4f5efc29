/**
 * Path: src/exchanges/common/defaults.ts
 * 거래소 클라이언트가 선택적으로 사용하는 기본 동작
 */
import { TradeSiteRequestType } from "./types"

// 요청 제한 없음
export function allowAllRequests(_requestType: TradeSiteRequestType): boolean {
    return true
}

// 대부분의 거래소에 무난한 갱신 주기 (마이크로초)
export const DEFAULT_UPDATE_INTERVAL_MICROS = 15 * 1000 * 1000
