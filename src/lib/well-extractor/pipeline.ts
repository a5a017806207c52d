/**
 * Well Extractor: Batch Pipeline
 *
 * Discovers report files under a folder and runs each one, strictly in
 * sequence, through extract → parse → upsert on a single store handle.
 */

import type { Dirent } from "node:fs";
import { readdir, readFile } from "node:fs/promises";
import path from "node:path";
import type { Database } from "../../db/client";
import { ConfigError } from "../errors";
import { parseStimulationData, parseWellInfo } from "./parse";
import { mimeTypeFor, type ExtractorRouter } from "./router";
import type { BatchSummary, DocumentOutcome } from "./types";
import { upsertDocument } from "./upsert";

/** The part of the router the pipeline needs */
export type DocumentProcessor = Pick<ExtractorRouter, "process">;

export interface BatchOptions {
    /** Stop at the first document whose processing throws, rethrowing its error */
    failFast?: boolean;
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

function isMissingPath(error: unknown): boolean {
    return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

/**
 * Every file under `folder` with a recognized extension, recursively,
 * sorted by path.
 *
 * @throws ConfigError when the folder does not exist
 */
export async function discoverDocuments(folder: string): Promise<string[]> {
    const found: string[] = [];

    const walk = async (dir: string): Promise<void> => {
        let entries: Dirent[];
        try {
            entries = await readdir(dir, { withFileTypes: true });
        } catch (error) {
            if (dir === folder && isMissingPath(error)) {
                throw new ConfigError(`Documents folder not found: ${folder}`);
            }
            throw error;
        }

        for (const entry of entries) {
            const fullPath = path.join(dir, entry.name);
            if (entry.isDirectory()) {
                await walk(fullPath);
            } else if (entry.isFile() && mimeTypeFor(entry.name) !== null) {
                found.push(fullPath);
            }
        }
    };

    await walk(folder);
    return found.sort();
}

/**
 * Run one file through the pipeline.
 *
 * Extraction problems never reject; they surface as a `no-text` skip.
 * Read and store errors propagate.
 */
export async function processDocument(
    db: Database,
    router: DocumentProcessor,
    filePath: string
): Promise<DocumentOutcome> {
    const fileName = path.basename(filePath);
    const buffer = await readFile(filePath);

    let text = "";
    try {
        const document = await router.process(buffer, fileName, mimeTypeFor(fileName) ?? "application/octet-stream");
        text = document.text;
    } catch (error) {
        console.error(`[Pipeline] Extraction failed for ${filePath}: ${errorMessage(error)}`);
    }

    if (!text.trim()) {
        console.warn(`[Pipeline] No text extracted from ${filePath}; skipping`);
        return { status: "skipped", source: filePath, reason: "no-text" };
    }

    const result = await upsertDocument(db, parseWellInfo(text), parseStimulationData(text), filePath);
    if (!result) {
        return { status: "skipped", source: filePath, reason: "no-identifier" };
    }

    console.info(
        `[Pipeline] Stored ${filePath}: well ${result.api} ${result.well}, stimulation ${result.stimulation}`
    );
    return { status: "stored", source: filePath, result };
}

/**
 * Process every document under `folder`, one at a time.
 *
 * A document whose processing throws is recorded as `failed` and the batch
 * moves on, unless `failFast` is set.
 */
export async function runBatch(
    db: Database,
    router: DocumentProcessor,
    folder: string,
    options: BatchOptions = {}
): Promise<BatchSummary> {
    const files = await discoverDocuments(folder);
    if (files.length === 0) {
        console.warn(`[Pipeline] No documents found in ${folder}`);
    }

    const outcomes: DocumentOutcome[] = [];
    for (const filePath of files) {
        try {
            outcomes.push(await processDocument(db, router, filePath));
        } catch (error) {
            if (options.failFast) {
                throw error;
            }
            console.error(`[Pipeline] Failed to process ${filePath}: ${errorMessage(error)}`);
            outcomes.push({ status: "failed", source: filePath, error: errorMessage(error) });
        }
    }

    const summary: BatchSummary = {
        outcomes,
        stored: outcomes.filter((outcome) => outcome.status === "stored").length,
        skipped: outcomes.filter((outcome) => outcome.status === "skipped").length,
        failed: outcomes.filter((outcome) => outcome.status === "failed").length,
    };
    console.info(
        `[Pipeline] Processed ${files.length} documents: ${summary.stored} stored, ${summary.skipped} skipped, ${summary.failed} failed`
    );
    return summary;
}
