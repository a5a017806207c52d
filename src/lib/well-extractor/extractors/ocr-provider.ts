/**
 * Well Extractor: Tesseract OCR Provider
 *
 * Implements the `OcrProvider` interface using Tesseract.js for
 * real text recognition from images, entirely in Node.js.
 *
 * A single worker is created on first use and shared by every page of
 * every document until `dispose()` terminates it.
 *
 * English language data ships with the `@tesseract.js-data/eng` package, so
 * the default setup reads it from disk instead of fetching it from a CDN.
 */

import { createRequire } from "node:module";
import path from "node:path";
import { createWorker, type Worker } from "tesseract.js";
import type { OcrProvider } from "../types";

// Model set tesseract.js loads for its default LSTM engine mode
const BUNDLED_MODEL_DIR = "4.0.0_best_int";

/** Directory of the bundled English `eng.traineddata.gz` */
export function bundledEnglishLangPath(): string {
    const require = createRequire(import.meta.url);
    const packageJson = require.resolve("@tesseract.js-data/eng/package.json");
    return path.join(path.dirname(packageJson), BUNDLED_MODEL_DIR);
}

export interface TesseractOptions {
    /** Tesseract language code(s), e.g. "eng", "eng+fra" */
    lang?: string;
    /**
     * Directory or URL holding `<lang>.traineddata.gz`. Defaults to the
     * bundled data when `lang` is "eng".
     */
    langPath?: string;
    /** Where downloaded language data is cached */
    cachePath?: string;
}

export class TesseractOcrProvider implements OcrProvider {
    private readonly lang: string;
    private readonly langPath?: string;
    private readonly cachePath?: string;
    private worker: Promise<Worker> | null = null;

    constructor(options: TesseractOptions = {}) {
        this.lang = options.lang ?? "eng";
        this.langPath = options.langPath ?? (this.lang === "eng" ? bundledEnglishLangPath() : undefined);
        this.cachePath = options.cachePath;
    }

    async recognize(imageBuffer: Buffer): Promise<string> {
        const worker = await this.getWorker();
        const {
            data: { text },
        } = await worker.recognize(imageBuffer);

        return text.trim();
    }

    async dispose(): Promise<void> {
        const pending = this.worker;
        this.worker = null;
        if (pending) {
            const worker = await pending;
            await worker.terminate();
        }
    }

    private async getWorker(): Promise<Worker> {
        if (!this.worker) {
            this.worker = createWorker(this.lang, undefined, {
                langPath: this.langPath,
                cachePath: this.cachePath,
                logger: () => { }, // silence progress logs
            });
        }
        try {
            return await this.worker;
        } catch (error) {
            // A failed start is not cached; the next page retries
            this.worker = null;
            throw error;
        }
    }
}
