/**
 * Well Extractor: PDF Extractor
 *
 * Reads the embedded text layer page by page with pdf.js (via `unpdf`).
 * Scanned reports have no text layer; when the whole document comes back
 * blank, every page is rasterized and run through the OCR provider instead.
 *
 * Extraction never rejects for a bad document: missing tools, corrupt
 * files and unreadable scans are logged and produce an empty page list.
 */

import { getDocumentProxy } from "unpdf";
import { v4 as uuidv4 } from "uuid";
import { ToolchainMissingError } from "../../errors";
import type {
    ExtractedDocument,
    Extractor,
    OcrProvider,
    PageText,
    Rasterizer,
    TextSource,
} from "../types";

const SUPPORTED_TYPES = ["application/pdf"];

export const DEFAULT_OCR_DPI = 300;

type PdfJsTextItem = { str?: string; hasEOL?: boolean };

export interface PdfExtractorOptions {
    ocrProvider: OcrProvider;
    rasterizer: Rasterizer;
    /** Rasterization resolution for the OCR fallback */
    dpi?: number;
}

interface TextLayer {
    pageCount: number;
    pages: PageText[];
}

function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}

export class PdfExtractor implements Extractor {
    readonly name = "PdfExtractor";

    private readonly ocrProvider: OcrProvider;
    private readonly rasterizer: Rasterizer;
    private readonly dpi: number;

    constructor(options: PdfExtractorOptions) {
        this.ocrProvider = options.ocrProvider;
        this.rasterizer = options.rasterizer;
        this.dpi = options.dpi ?? DEFAULT_OCR_DPI;
    }

    supports(mimeType: string): boolean {
        return SUPPORTED_TYPES.includes(mimeType);
    }

    async extract(buffer: Buffer, fileName: string): Promise<ExtractedDocument> {
        const textLayer = await this.extractTextLayer(buffer, fileName);
        if (textLayer.pages.length > 0) {
            return this.buildDocument(fileName, textLayer.pageCount, textLayer.pages, "text-layer");
        }

        console.info(`[PdfExtractor] Falling back to OCR for ${fileName}`);
        const ocr = await this.extractWithOcr(buffer, fileName);
        const pageCount = Math.max(textLayer.pageCount, ocr.pageCount);
        return this.buildDocument(fileName, pageCount, ocr.pages, ocr.pages.length > 0 ? "ocr" : "none");
    }

    // ---------------------------------------------------------------------------
    // Text layer
    // ---------------------------------------------------------------------------

    private async extractTextLayer(buffer: Buffer, fileName: string): Promise<TextLayer> {
        let pdf: Awaited<ReturnType<typeof getDocumentProxy>>;
        try {
            // pdf.js refuses Node Buffers and may detach what it is given
            pdf = await getDocumentProxy(new Uint8Array(buffer));
        } catch (error) {
            console.warn(`[PdfExtractor] Failed to open text layer for ${fileName}: ${errorMessage(error)}`);
            return { pageCount: 0, pages: [] };
        }

        const pages: PageText[] = [];
        try {
            for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
                try {
                    const page = await pdf.getPage(pageNumber);
                    const content = await page.getTextContent();
                    const text = this.joinTextItems(
                        content.items.map((item) => ("str" in item ? { str: item.str, hasEOL: item.hasEOL } : {}))
                    );
                    if (text) {
                        pages.push({ page: pageNumber, text, source: "text-layer" });
                    }
                } catch (error) {
                    console.warn(
                        `[PdfExtractor] Text extraction failed for ${fileName} page ${pageNumber}: ${errorMessage(error)}`
                    );
                }
            }
            return { pageCount: pdf.numPages, pages };
        } finally {
            await pdf.destroy();
        }
    }

    private joinTextItems(items: readonly PdfJsTextItem[]): string {
        const raw = items
            .map((item) => {
                if (!item.str) {
                    return item.hasEOL ? "\n" : "";
                }
                return item.hasEOL ? `${item.str}\n` : item.str;
            })
            .join("");

        return raw
            .split("\n")
            .map((line) => line.replace(/[ \t]+/g, " ").trim())
            .join("\n")
            .replace(/\n{3,}/g, "\n\n")
            .trim();
    }

    // ---------------------------------------------------------------------------
    // OCR fallback
    // ---------------------------------------------------------------------------

    private async extractWithOcr(buffer: Buffer, fileName: string): Promise<TextLayer> {
        let images: Buffer[];
        try {
            images = await this.rasterizer.rasterize(buffer, { dpi: this.dpi });
        } catch (error) {
            if (error instanceof ToolchainMissingError) {
                console.error(`[PdfExtractor] Cannot OCR ${fileName}: ${error.message}`);
            } else {
                console.error(`[PdfExtractor] Rasterization failed for ${fileName}: ${errorMessage(error)}`);
            }
            return { pageCount: 0, pages: [] };
        }

        const pages: PageText[] = [];
        let failures = 0;
        for (const [index, image] of images.entries()) {
            const pageNumber = index + 1;
            try {
                const text = (await this.ocrProvider.recognize(image)).trim();
                if (text) {
                    pages.push({ page: pageNumber, text, source: "ocr" });
                }
            } catch (error) {
                failures += 1;
                console.warn(`[PdfExtractor] OCR failed for ${fileName} page ${pageNumber}: ${errorMessage(error)}`);
            }
        }

        if (images.length > 0 && failures === images.length) {
            console.error(`[PdfExtractor] OCR failed on every page of ${fileName}`);
        }

        return { pageCount: images.length, pages };
    }

    private buildDocument(
        fileName: string,
        pageCount: number,
        pages: PageText[],
        textSource: TextSource | "none"
    ): ExtractedDocument {
        return {
            documentId: uuidv4(),
            fileName,
            mimeType: "application/pdf",
            metadata: {
                pageCount,
                ocrPages: pages.filter((page) => page.source === "ocr").map((page) => page.page),
                textSource,
            },
            pages,
        };
    }
}
