export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";
export type LogContext = Record<string, unknown>;

export interface Logger {
    debug: (message: string, ...args: unknown[]) => void;
    info: (message: string, ...args: unknown[]) => void;
    warn: (message: string, ...args: unknown[]) => void;
    error: (message: string, ...args: unknown[]) => void;
    /** Nested scope, joined with a dot: `orchestrator.session`. */
    child: (scope: string) => Logger;
    /** Same scope, with `context` merged into every structured log line. */
    withContext: (context: LogContext) => Logger;
}

const LOG_LEVELS: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
    silent: 4,
};

function isLogLevel(value: string): value is LogLevel {
    return value in LOG_LEVELS;
}

function resolveLogLevel(): LogLevel {
    const configured = process.env.LOG_LEVEL?.trim().toLowerCase();
    if (!configured) {
        return process.env.NODE_ENV === "production" ? "info" : "debug";
    }
    return isLogLevel(configured) ? configured : "silent";
}

const currentLevel = resolveLogLevel();

function isLogContextCandidate(value: unknown): value is LogContext {
    return (
        typeof value === "object" &&
        value !== null &&
        !Array.isArray(value) &&
        !(value instanceof Error)
    );
}

function normalizeError(error: unknown): unknown {
    if (!(error instanceof Error)) {
        return error;
    }

    const normalized: LogContext = {
        name: error.name,
        message: error.message,
        stack: error.stack,
    };
    const code = Reflect.get(error, "code");
    if (typeof code === "string") {
        normalized.code = code;
    }
    return normalized;
}

function normalizeContext(context: LogContext): LogContext {
    const output: LogContext = {};
    for (const [key, value] of Object.entries(context)) {
        output[key] = normalizeError(value);
    }
    return output;
}

function emit(
    level: Exclude<LogLevel, "silent">,
    message: string,
    scope: string | null,
    bound: LogContext | null,
    args: unknown[],
): void {
    if (LOG_LEVELS[level] < LOG_LEVELS[currentLevel]) {
        return;
    }

    const [first, ...rest] = args;
    const explicit = isLogContextCandidate(first) ? first : null;
    const passthrough = (explicit ? rest : args).map(normalizeError);
    const context =
        bound || explicit
            ? normalizeContext({ ...(bound ?? {}), ...(explicit ?? {}) })
            : null;

    const prefix = scope
        ? `${new Date().toISOString()} [${level.toUpperCase()}] [${scope}] ${message}`
        : `${new Date().toISOString()} [${level.toUpperCase()}] ${message}`;

    const method = level === "debug"
        ? console.debug
        : level === "info"
            ? console.info
            : level === "warn"
                ? console.warn
                : console.error;

    if (context) {
        method(prefix, context, ...passthrough);
        return;
    }
    method(prefix, ...passthrough);
}

function buildLogger(scope: string | null, bound: LogContext | null): Logger {
    return {
        debug: (message, ...args) => emit("debug", message, scope, bound, args),
        info: (message, ...args) => emit("info", message, scope, bound, args),
        warn: (message, ...args) => emit("warn", message, scope, bound, args),
        error: (message, ...args) => emit("error", message, scope, bound, args),
        child: (childScope) => {
            const trimmed = childScope.trim();
            return buildLogger(scope ? `${scope}.${trimmed}` : trimmed, bound);
        },
        withContext: (context) =>
            buildLogger(scope, { ...(bound ?? {}), ...context }),
    };
}

export function createLogger(scope?: string): Logger {
    return buildLogger(scope?.trim() || null, null);
}

export async function withLogTiming<T>(
    loggerInstance: Logger,
    operation: string,
    run: () => Promise<T> | T,
    context: LogContext = {},
): Promise<T> {
    const startedAt = Date.now();
    loggerInstance.debug(`${operation} started`, context);

    try {
        const result = await run();
        loggerInstance.debug(`${operation} completed`, {
            ...context,
            durationMs: Date.now() - startedAt,
        });
        return result;
    } catch (error) {
        loggerInstance.warn(`${operation} failed`, {
            ...context,
            durationMs: Date.now() - startedAt,
            error,
        });
        throw error;
    }
}

export const logger = createLogger();
