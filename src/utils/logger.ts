import { Logger, pino } from "pino";

let instance: Logger | null = null;

// Logger compartilhado; nível controlado por LOG_LEVEL (default: info)
export function logger(): Logger {
    if (!instance) {
        instance = pino({ level: process.env.LOG_LEVEL || 'info' });
    }
    return instance;
}
