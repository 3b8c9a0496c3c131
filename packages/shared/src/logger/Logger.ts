/**
 * Shared Logger - structured JSON logging for Hedgeline services
 *
 * Two outputs:
 * 1. Structured log lines (console and optional file)
 * 2. Append-only event log (JSONL) for cycle, phase and emergency events
 */

import { randomUUID } from "crypto";
import * as fs from "fs";
import * as path from "path";

/**
 * Log levels in order of severity
 */
export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    FATAL = 4,
}

export type LogMetadata = Record<string, unknown>;

/**
 * Structured log entry
 */
export interface LogEntry {
    timestamp: string;
    level: string;
    message: string;
    correlationId?: string;
    component?: string;
    operation?: string;
    duration?: number;
    metadata?: LogMetadata;
    error?: {
        name: string;
        message: string;
        stack?: string;
        code?: string | number;
    };
}

/**
 * Event log entry written to events.jsonl
 */
export interface EventLogEntry {
    timestamp: string;
    service: string;
    event: string;
    cycleId?: string;
    token?: string;
    phase?: string;
    details?: LogMetadata;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
    level: LogLevel;
    component: string;
    enableConsole: boolean;
    enableFile: boolean;
    filePath?: string;
    sensitiveFields: string[];
    maxStackTraceLines: number;
    enableEventLog: boolean;
    eventLogPath?: string;
}

const MASK = "[MASKED]";

export function parseLogLevel(value: string | undefined): LogLevel {
    switch ((value ?? "INFO").toUpperCase()) {
        case "DEBUG":
            return LogLevel.DEBUG;
        case "WARN":
        case "WARNING":
            return LogLevel.WARN;
        case "ERROR":
            return LogLevel.ERROR;
        case "FATAL":
        case "CRITICAL":
            return LogLevel.FATAL;
        default:
            return LogLevel.INFO;
    }
}

function errorCode(error: Error): string | number | undefined {
    if ("code" in error) {
        const code = error.code;
        if (typeof code === "string" || typeof code === "number") {
            return code;
        }
    }
    return undefined;
}

/**
 * Unified Shared Logger
 */
export class Logger {
    private config: LoggerConfig;
    private static instance: Logger | null = null;

    constructor(config: LoggerConfig) {
        this.config = config;

        if (this.config.enableEventLog && this.config.eventLogPath) {
            this.initEventLog(this.config.eventLogPath);
        }
    }

    /**
     * Create logger configuration from environment variables
     */
    static createConfigFromEnv(component: string): LoggerConfig {
        return {
            level: parseLogLevel(process.env.LOG_LEVEL),
            component,
            enableConsole: process.env.LOG_ENABLE_CONSOLE !== "false",
            enableFile: process.env.LOG_ENABLE_FILE === "true",
            filePath: process.env.LOG_FILE_PATH,
            sensitiveFields: (process.env.LOG_SENSITIVE_FIELDS ||
                "password,secret,token,key,authorization").split(","),
            maxStackTraceLines: parseInt(
                process.env.LOG_MAX_STACK_LINES || "10",
                10,
            ),
            enableEventLog: process.env.EVENT_LOG_PATH !== undefined,
            eventLogPath: process.env.EVENT_LOG_PATH,
        };
    }

    /**
     * Get or create singleton logger instance
     */
    static getInstance(component: string = "hedgeline"): Logger {
        if (!Logger.instance) {
            Logger.instance = new Logger(Logger.createConfigFromEnv(component));
        }
        return Logger.instance;
    }

    /**
     * Generate a new correlation ID
     */
    static generateCorrelationId(): string {
        return randomUUID();
    }

    /**
     * Logger for a sub-component sharing this logger's outputs
     */
    child(component: string): Logger {
        return new Logger({
            ...this.config,
            component: `${this.config.component}:${component}`,
            enableEventLog: false,
            eventLogPath: this.config.eventLogPath,
        });
    }

    // ==========================================
    // Structured Logging
    // ==========================================

    private isSensitiveKey(key: string): boolean {
        const lowerKey = key.toLowerCase();
        return this.config.sensitiveFields.some((field) =>
            field.length > 0 && lowerKey.includes(field.toLowerCase())
        );
    }

    maskSensitiveData(value: unknown): unknown {
        if (value === null || value === undefined) return value;
        if (Array.isArray(value)) {
            return value.map((item) => this.maskSensitiveData(item));
        }
        if (value instanceof Error) {
            return { name: value.name, message: value.message };
        }
        if (typeof value === "bigint") {
            return value.toString();
        }
        if (typeof value === "object") {
            const masked: LogMetadata = {};
            for (const [key, inner] of Object.entries(value)) {
                masked[key] = this.isSensitiveKey(key)
                    ? MASK
                    : this.maskSensitiveData(inner);
            }
            return masked;
        }
        return value;
    }

    private maskMetadata(metadata: LogMetadata): LogMetadata {
        const masked: LogMetadata = {};
        for (const [key, value] of Object.entries(metadata)) {
            masked[key] = this.isSensitiveKey(key)
                ? MASK
                : this.maskSensitiveData(value);
        }
        return masked;
    }

    private formatError(error: Error): LogEntry["error"] {
        const stackLines = error.stack?.split("\n").slice(
            0,
            this.config.maxStackTraceLines,
        );
        return {
            name: error.name,
            message: error.message,
            stack: stackLines?.join("\n"),
            code: errorCode(error),
        };
    }

    private createLogEntry(
        level: LogLevel,
        message: string,
        correlationId?: string,
        metadata?: LogMetadata,
        error?: Error,
    ): LogEntry {
        const entry: LogEntry = {
            timestamp: new Date().toISOString(),
            level: LogLevel[level],
            message,
            component: this.config.component,
        };
        if (correlationId) entry.correlationId = correlationId;
        if (metadata) entry.metadata = this.maskMetadata(metadata);
        if (error) entry.error = this.formatError(error);
        return entry;
    }

    private writeLog(entry: LogEntry): void {
        const logString = JSON.stringify(entry);

        if (this.config.enableConsole) {
            switch (entry.level) {
                case "DEBUG":
                    console.debug(logString);
                    break;
                case "INFO":
                    console.info(logString);
                    break;
                case "WARN":
                    console.warn(logString);
                    break;
                default:
                    console.error(logString);
            }
        }

        if (this.config.enableFile && this.config.filePath) {
            try {
                fs.mkdirSync(path.dirname(this.config.filePath), {
                    recursive: true,
                });
                fs.appendFileSync(this.config.filePath, logString + "\n");
            } catch (error) {
                console.error("Failed to write to log file:", error);
            }
        }
    }

    private shouldLog(level: LogLevel): boolean {
        return level >= this.config.level;
    }

    debug(message: string, correlationId?: string, metadata?: LogMetadata): void {
        if (!this.shouldLog(LogLevel.DEBUG)) return;
        this.writeLog(
            this.createLogEntry(LogLevel.DEBUG, message, correlationId, metadata),
        );
    }

    info(message: string, correlationId?: string, metadata?: LogMetadata): void {
        if (!this.shouldLog(LogLevel.INFO)) return;
        this.writeLog(
            this.createLogEntry(LogLevel.INFO, message, correlationId, metadata),
        );
    }

    warn(message: string, correlationId?: string, metadata?: LogMetadata): void {
        if (!this.shouldLog(LogLevel.WARN)) return;
        this.writeLog(
            this.createLogEntry(LogLevel.WARN, message, correlationId, metadata),
        );
    }

    error(
        message: string,
        error?: Error,
        correlationId?: string,
        metadata?: LogMetadata,
    ): void {
        if (!this.shouldLog(LogLevel.ERROR)) return;
        this.writeLog(
            this.createLogEntry(
                LogLevel.ERROR,
                message,
                correlationId,
                metadata,
                error,
            ),
        );
    }

    fatal(
        message: string,
        error?: Error,
        correlationId?: string,
        metadata?: LogMetadata,
    ): void {
        if (!this.shouldLog(LogLevel.FATAL)) return;
        this.writeLog(
            this.createLogEntry(
                LogLevel.FATAL,
                message,
                correlationId,
                metadata,
                error,
            ),
        );
    }

    // ==========================================
    // Event Log
    // ==========================================

    private initEventLog(eventLogPath: string): void {
        try {
            fs.mkdirSync(path.dirname(eventLogPath), { recursive: true });
            if (!fs.existsSync(eventLogPath)) {
                fs.writeFileSync(eventLogPath, "");
            }
        } catch (error) {
            console.error(
                `Failed to initialize event log at ${eventLogPath}:`,
                error,
            );
        }
    }

    /**
     * Append an entry to the event log
     */
    logEvent(
        event: string,
        fields: Omit<EventLogEntry, "timestamp" | "service" | "event"> = {},
    ): void {
        if (!this.config.eventLogPath) {
            return;
        }

        const entry: EventLogEntry = {
            timestamp: new Date().toISOString(),
            service: this.config.component,
            event,
            ...fields,
        };
        if (fields.details) {
            entry.details = this.maskMetadata(fields.details);
        }

        try {
            fs.appendFileSync(
                this.config.eventLogPath,
                JSON.stringify(entry) + "\n",
            );
        } catch (error) {
            console.error("Failed to write event log entry:", error);
        }
    }

    /**
     * Read back event log entries, optionally filtered
     */
    queryEvents(filter?: (entry: EventLogEntry) => boolean): EventLogEntry[] {
        if (
            !this.config.eventLogPath ||
            !fs.existsSync(this.config.eventLogPath)
        ) return [];
        const content = fs.readFileSync(this.config.eventLogPath, "utf-8");
        const entries: EventLogEntry[] = content
            .split("\n")
            .filter((line) => line.trim())
            .map((line): EventLogEntry => JSON.parse(line));
        return filter ? entries.filter(filter) : entries;
    }

    /**
     * Get current configuration
     */
    getConfig(): LoggerConfig {
        return { ...this.config };
    }

    /**
     * Update log level
     */
    setLogLevel(level: LogLevel): void {
        this.config.level = level;
        this.info(`Log level changed to ${LogLevel[level]}`);
    }

    /**
     * Silent logger, for tests and embedding
     */
    static silent(component: string = "test"): Logger {
        return new Logger({
            level: LogLevel.FATAL,
            component,
            enableConsole: false,
            enableFile: false,
            sensitiveFields: [],
            maxStackTraceLines: 0,
            enableEventLog: false,
        });
    }
}
