/**
 * Path: tests/helpers/MockHttpClient.ts
 * 네트워크 없이 URL별 응답을 돌려주는 HTTP 클라이언트
 */
import { IHttpClient } from "../../src/utils/http"

export class MockHttpClient implements IHttpClient {
    readonly requests: string[] = []
    private readonly responses = new Map<string, string | null>()

    setResponse(url: string, body: string | null): this {
        this.responses.set(url, body)
        return this
    }

    setJson(url: string, data: unknown): this {
        return this.setResponse(url, JSON.stringify(data))
    }

    async get(url: string): Promise<string | null> {
        this.requests.push(url)
        return this.responses.get(url) ?? null
    }
}
