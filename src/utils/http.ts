/**
 * Path: src/utils/http.ts
 * 단순 HTTP GET 헬퍼
 */
import axios from "axios"
import { ILogger, Logger } from "./logger"

export interface IHttpClient {
    /** 응답 본문, 실패 시 null */
    get(url: string): Promise<string | null>
}

export interface HttpClientOptions {
    timeout?: number
    userAgent?: string
}

export class AxiosHttpClient implements IHttpClient {
    private readonly timeout: number
    private readonly userAgent: string

    constructor(
        options: HttpClientOptions = {},
        private readonly logger: ILogger = Logger.getInstance("HttpClient")
    ) {
        this.timeout = options.timeout ?? 10000
        this.userAgent = options.userAgent ?? "poloniex-trade-client"
    }

    async get(url: string): Promise<string | null> {
        try {
            const response = await axios.get<unknown>(url, {
                timeout: this.timeout,
                responseType: "text",
                headers: { "User-Agent": this.userAgent },
            })

            const data = response.data
            if (typeof data === "string") return data
            if (data === undefined || data === null) return null
            return JSON.stringify(data)
        } catch (error) {
            if (axios.isAxiosError(error)) {
                this.logger.warn("HTTP request failed", {
                    url,
                    status: error.response?.status,
                    message: error.message,
                })
            } else {
                this.logger.error(`HTTP request failed: ${url}`, error)
            }
            return null
        }
    }
}
