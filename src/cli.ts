#!/usr/bin/env tsx

/**
 * Command line entry point.
 *
 *   well-stim-ingest ingest [folder] [--fail-fast] [--dpi N]
 *   well-stim-ingest serve [--port N]
 *
 * `ingest` is the default command. Settings come from the environment
 * (and `.env`); flags override the matching variables.
 */

import "dotenv/config";
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";
import { loadConfig, type AppConfig } from "@/config";
import { openStore } from "@/db/client";
import { AppError, ConfigError } from "@/lib/errors";
import { ExtractorRouter, PdftoppmRasterizer, runBatch, TesseractOcrProvider } from "@/lib/well-extractor";
import { createApiServer } from "@/server";

const USAGE = `Usage:
  well-stim-ingest ingest [folder] [--fail-fast] [--dpi N]
  well-stim-ingest serve [--port N]`;

export type CliCommand =
    | { command: "ingest"; folder?: string; failFast: boolean; dpi?: number }
    | { command: "serve"; port?: number };

// Same bounds as OCR_DPI and API_PORT in config.ts
const DPI_RANGE = { min: 72, max: 1200 };
const PORT_RANGE = { min: 1, max: 65535 };

function parseBoundedInt(
    flag: string,
    value: string | undefined,
    range: { min: number; max: number }
): number | undefined {
    if (value === undefined) {
        return undefined;
    }
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < range.min || parsed > range.max) {
        throw new ConfigError(`--${flag} must be an integer between ${range.min} and ${range.max}`, [
            { field: flag, message: `Got "${value}"` },
        ]);
    }
    return parsed;
}

/** @throws ConfigError for an unknown command or malformed flag value */
export function parseCliArgs(argv: string[]): CliCommand {
    let parsed;
    try {
        parsed = parseArgs({
            args: argv,
            allowPositionals: true,
            options: {
                "fail-fast": { type: "boolean", default: false },
                dpi: { type: "string" },
                port: { type: "string" },
            },
        });
    } catch (error) {
        // Unknown or malformed flags
        throw new ConfigError(error instanceof Error ? error.message : String(error));
    }
    const { values, positionals } = parsed;

    const [command = "ingest", ...rest] = positionals;
    switch (command) {
        case "ingest":
            return {
                command,
                folder: rest[0],
                failFast: values["fail-fast"] ?? false,
                dpi: parseBoundedInt("dpi", values.dpi, DPI_RANGE),
            };
        case "serve":
            return { command, port: parseBoundedInt("port", values.port, PORT_RANGE) };
        default:
            throw new ConfigError(`Unknown command: ${command}`);
    }
}

async function ingest(config: AppConfig, args: Extract<CliCommand, { command: "ingest" }>): Promise<number> {
    const ocrProvider = new TesseractOcrProvider({
        lang: config.ocr.lang,
        langPath: config.ocr.langPath,
        cachePath: config.ocr.cachePath,
    });
    const router = new ExtractorRouter({
        ocrProvider,
        rasterizer: new PdftoppmRasterizer({ popplerPath: config.ocr.popplerPath }),
        dpi: args.dpi ?? config.ocr.dpi,
    });

    const store = await openStore(config);
    try {
        const summary = await runBatch(store.db, router, args.folder ?? config.documentsDir, {
            failFast: args.failFast,
        });
        return summary.failed > 0 ? 1 : 0;
    } finally {
        await ocrProvider.dispose();
        await store.close();
    }
}

async function serve(config: AppConfig, args: Extract<CliCommand, { command: "serve" }>): Promise<number> {
    const store = await openStore(config);
    try {
        const server = createApiServer(store.db);
        const port = args.port ?? config.apiPort;

        await new Promise<void>((resolve, reject) => {
            server.once("error", reject);
            server.listen(port, () => {
                console.info(`[Api] Listening on http://localhost:${port}`);
                resolve();
            });
        });

        await new Promise<void>((resolve) => {
            const shutdown = () => {
                server.close(() => resolve());
            };
            process.once("SIGINT", shutdown);
            process.once("SIGTERM", shutdown);
        });

        return 0;
    } finally {
        await store.close();
    }
}

export async function main(argv: string[]): Promise<number> {
    try {
        const args = parseCliArgs(argv);
        const config = loadConfig();
        return args.command === "serve" ? await serve(config, args) : await ingest(config, args);
    } catch (error) {
        if (error instanceof AppError) {
            console.error(`[Cli] ${error.message}`);
            for (const detail of error.details ?? []) {
                console.error(`  ${detail.field ?? "-"}: ${detail.message}`);
            }
            if (error instanceof ConfigError) {
                console.error(USAGE);
            }
            return 2;
        }
        throw error;
    }
}

const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
    main(process.argv.slice(2)).then(
        (code) => {
            process.exitCode = code;
        },
        (error: unknown) => {
            console.error("[Cli] Fatal error:", error);
            process.exitCode = 1;
        }
    );
}
