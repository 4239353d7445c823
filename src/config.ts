import dotenv from "dotenv";
import { z } from "zod";
import * as fs from "fs";
import * as path from "path";
import { logger } from "./utils/logger";

dotenv.config();

const positiveInt = (fallback: number) =>
    z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
    PORT: positiveInt(3006),
    NODE_ENV: z.enum(["development", "production", "test"]).default("development"),
    EXTRACTOR_URL: z.string().url().default("http://127.0.0.1:8590"),
    AUDIO_GATEWAY_URL: z.string().url().default("http://127.0.0.1:8591"),
    AUDIO_GATEWAY_TIMEOUT_MS: positiveInt(10_000),
    DRIVER_CALLBACK_TOKEN: z.string().min(8).optional(),
    RESOLVE_MAX_ATTEMPTS: positiveInt(3),
    RESOLVE_BACKOFF_MS: z.coerce.number().int().min(0).default(1000),
    PLAYLIST_MAX_ITEMS: positiveInt(50),
    SEARCH_RESULT_LIMIT: positiveInt(5),
    STATUS_TICK_MS: positiveInt(1000),
    QUEUE_PREVIEW_SIZE: positiveInt(5),
    PLAYLIST_ALIASES_PATH: z.string().min(1).default("config/playlists.json"),
    ALLOWED_ORIGINS: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

function parseEnv(): Env {
    const result = envSchema.safeParse(process.env);
    if (result.success) {
        logger.debug("Environment variables validated");
        return result.data;
    }

    logger.error("Environment validation failed:");
    result.error.errors.forEach((err) => {
        logger.error(`   - ${err.path.join(".")}: ${err.message}`);
    });
    process.exit(1);
}

const playlistAliasesSchema = z.record(z.string().url());

/**
 * Reads the alias → playlist URL table. A missing file means no aliases;
 * a malformed one is logged and ignored.
 */
export function loadPlaylistAliases(filePath: string): Record<string, string> {
    const resolved = path.resolve(filePath);
    if (!fs.existsSync(resolved)) {
        logger.debug(`No playlist alias file at ${resolved}`);
        return {};
    }

    try {
        const parsed = playlistAliasesSchema.safeParse(
            JSON.parse(fs.readFileSync(resolved, "utf8"))
        );
        if (!parsed.success) {
            logger.warn(`Ignoring malformed playlist alias file ${resolved}`, {
                issues: parsed.error.errors.map((err) => err.message),
            });
            return {};
        }
        return parsed.data;
    } catch (err) {
        logger.warn(`Could not read playlist alias file ${resolved}`, { error: err });
        return {};
    }
}

function parseAllowedOrigins(value: string | undefined): string[] | true {
    if (value === undefined || value.trim() === "") return true;
    return value
        .split(",")
        .map((entry) => entry.trim())
        .filter((entry) => entry.length > 0);
}

const env = parseEnv();

/** Centralized runtime configuration for the orchestrator and its HTTP surface. */
export const config = {
    port: env.PORT,
    nodeEnv: env.NODE_ENV,
    allowedOrigins: parseAllowedOrigins(env.ALLOWED_ORIGINS),

    extractor: {
        url: env.EXTRACTOR_URL,
    },

    audioGateway: {
        url: env.AUDIO_GATEWAY_URL,
        timeoutMs: env.AUDIO_GATEWAY_TIMEOUT_MS,
        callbackToken: env.DRIVER_CALLBACK_TOKEN,
    },

    resolver: {
        maxAttempts: env.RESOLVE_MAX_ATTEMPTS,
        backoffMs: env.RESOLVE_BACKOFF_MS,
        playlistMaxItems: env.PLAYLIST_MAX_ITEMS,
        searchResultLimit: env.SEARCH_RESULT_LIMIT,
        playlistAliasesPath: env.PLAYLIST_ALIASES_PATH,
    },

    status: {
        tickMs: env.STATUS_TICK_MS,
        queuePreviewSize: env.QUEUE_PREVIEW_SIZE,
    },
};

export type AppConfig = typeof config;
