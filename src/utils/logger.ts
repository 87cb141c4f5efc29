/**
 * Path: src/utils/logger.ts
 */

import path from "path"
import winston from "winston"
import DailyRotateFile from "winston-daily-rotate-file"

export type LogMeta = Record<string, unknown>

export interface ILogger {
    info(message: string, meta?: LogMeta): void
    warn(message: string, meta?: LogMeta): void
    error(message: string, error?: unknown): void
    debug(message: string, meta?: LogMeta): void
}

export interface LoggerOptions {
    level?: string
    logDir?: string
}

export class Logger implements ILogger {
    private logger: winston.Logger
    private static instances: Map<string, Logger> = new Map()
    private static options: LoggerOptions = {}

    private constructor(module: string, options: LoggerOptions) {
        this.logger = winston.createLogger({
            level: options.level || process.env.LOG_LEVEL || "info",
            format: winston.format.combine(
                winston.format.timestamp(),
                winston.format.errors({ stack: true }),
                winston.format.json()
            ),
            defaultMeta: { module },
            transports: Logger.getTransports(options),
        })
    }

    // 이미 생성된 인스턴스에는 적용되지 않음
    static configure(options: LoggerOptions): void {
        Logger.options = { ...options }
    }

    static getInstance(module: string): Logger {
        const existing = Logger.instances.get(module)
        if (existing) return existing

        const logger = new Logger(module, Logger.options)
        Logger.instances.set(module, logger)
        return logger
    }

    private static getTransports(options: LoggerOptions): winston.transport[] {
        const transports: winston.transport[] = [
            // 콘솔 출력
            new winston.transports.Console({
                format: winston.format.combine(
                    winston.format.colorize(),
                    winston.format.simple()
                ),
            }),
        ]

        if (options.logDir) {
            transports.push(
                // 일별 로그 파일
                new DailyRotateFile({
                    filename: path.join(
                        options.logDir,
                        "application-%DATE%.log"
                    ),
                    datePattern: "YYYY-MM-DD",
                    zippedArchive: true,
                    maxSize: "20m",
                    maxFiles: "14d",
                }),
                // 에러 로그 파일
                new DailyRotateFile({
                    filename: path.join(options.logDir, "error-%DATE%.log"),
                    datePattern: "YYYY-MM-DD",
                    zippedArchive: true,
                    maxSize: "20m",
                    maxFiles: "14d",
                    level: "error",
                })
            )
        }

        return transports
    }

    info(message: string, meta?: LogMeta): void {
        this.logger.info(message, meta)
    }

    error(message: string, error?: unknown): void {
        if (error instanceof Error) {
            this.logger.error(message, {
                error: error.message,
                stack: error.stack,
            })
        } else {
            this.logger.error(message, { error })
        }
    }

    warn(message: string, meta?: LogMeta): void {
        this.logger.warn(message, meta)
    }

    debug(message: string, meta?: LogMeta): void {
        this.logger.debug(message, meta)
    }
}
