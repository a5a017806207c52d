/**
 * Runtime configuration, read from the environment and validated once.
 *
 * The CLI loads `.env` with dotenv before calling `loadConfig`; library code
 * receives the parsed object and never reads `process.env` itself.
 */

import { z } from "zod";
import { ConfigError } from "./lib/errors";

const optionalPath = z
    .string()
    .trim()
    .transform((value) => (value.length > 0 ? value : undefined))
    .optional();

const envSchema = z.object({
    DATABASE_URL: z.string().url().optional(),
    DB_HOST: z.string().min(1).default("localhost"),
    DB_PORT: z.coerce.number().int().min(1).max(65535).default(5432),
    DB_USER: z.string().min(1).default("oil_user"),
    DB_PASSWORD: z.string().default("oil_pass"),
    DB_NAME: z.string().min(1).default("oil_wells"),

    POPPLER_PATH: optionalPath,
    TESSERACT_LANG: z.string().min(1).default("eng"),
    TESSERACT_LANG_PATH: optionalPath,
    TESSERACT_CACHE_PATH: optionalPath,
    OCR_DPI: z.coerce.number().int().min(72).max(1200).default(300),

    DOCUMENTS_DIR: z.string().min(1).default("./pdfs"),
    API_PORT: z.coerce.number().int().min(1).max(65535).default(5000),
});

type Env = z.infer<typeof envSchema>;

export interface StoreConfig {
    url?: string;
    host: string;
    port: number;
    user: string;
    password: string;
    database: string;
}

export interface OcrConfig {
    popplerPath?: string;
    lang: string;
    langPath?: string;
    cachePath?: string;
    dpi: number;
}

export interface AppConfig {
    store: StoreConfig;
    ocr: OcrConfig;
    documentsDir: string;
    apiPort: number;
}

/**
 * Parse and validate configuration.
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        throw ConfigError.fromZodError(parsed.error);
    }
    return toAppConfig(parsed.data);
}

function toAppConfig(env: Env): AppConfig {
    return {
        store: {
            url: env.DATABASE_URL,
            host: env.DB_HOST,
            port: env.DB_PORT,
            user: env.DB_USER,
            password: env.DB_PASSWORD,
            database: env.DB_NAME,
        },
        ocr: {
            popplerPath: env.POPPLER_PATH,
            lang: env.TESSERACT_LANG,
            langPath: env.TESSERACT_LANG_PATH,
            cachePath: env.TESSERACT_CACHE_PATH,
            dpi: env.OCR_DPI,
        },
        documentsDir: env.DOCUMENTS_DIR,
        apiPort: env.API_PORT,
    };
}

/** Connection string for the store; an explicit DATABASE_URL wins */
export function databaseUrl(config: AppConfig): string {
    const { store } = config;
    if (store.url) {
        return store.url;
    }
    const user = encodeURIComponent(store.user);
    const password = encodeURIComponent(store.password);
    return `postgres://${user}:${password}@${store.host}:${store.port}/${store.database}`;
}
