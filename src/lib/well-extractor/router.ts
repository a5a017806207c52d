/**
 * Well Extractor: Extractor Router
 *
 * Central registry that matches incoming files to the correct extractor
 * based on MIME type, then runs extraction + normalization.
 *
 * Pre-registers the PDF and image extractors on construction; both share
 * the one OCR provider they are given.
 */

import path from "node:path";
import { UnsupportedDocumentError } from "../errors";
import { ImageExtractor } from "./extractors/image";
import { PdfExtractor } from "./extractors/pdf";
import { normalizeDocument } from "./normalize";
import type { Extractor, NormalizedDocument, OcrProvider, Rasterizer } from "./types";

const EXTENSION_MIME_MAP: Record<string, string> = {
    ".pdf": "application/pdf",
    ".png": "image/png",
    ".jpg": "image/jpeg",
    ".jpeg": "image/jpeg",
    ".tif": "image/tiff",
    ".tiff": "image/tiff",
};

/** MIME type from a file name's extension, case-insensitive; `null` if unknown */
export function mimeTypeFor(fileName: string): string | null {
    return EXTENSION_MIME_MAP[path.extname(fileName).toLowerCase()] ?? null;
}

export interface ExtractorRouterOptions {
    ocrProvider: OcrProvider;
    rasterizer: Rasterizer;
    /** OCR rasterization resolution */
    dpi?: number;
}

export class ExtractorRouter {
    private readonly extractors: Extractor[] = [];

    constructor(options: ExtractorRouterOptions) {
        // Register built-in extractors in priority order
        this.register(
            new PdfExtractor({
                ocrProvider: options.ocrProvider,
                rasterizer: options.rasterizer,
                dpi: options.dpi,
            })
        );
        this.register(new ImageExtractor(options.ocrProvider));
    }

    // ---------------------------------------------------------------------------
    // Public API
    // ---------------------------------------------------------------------------

    /** Add a custom extractor to the registry */
    register(extractor: Extractor): void {
        this.extractors.push(extractor);
    }

    /**
     * Find the first extractor that supports the given MIME type.
     * @throws UnsupportedDocumentError if no extractor is registered for the type
     */
    route(mimeType: string): Extractor {
        const extractor = this.extractors.find((e) => e.supports(mimeType));
        if (!extractor) {
            throw new UnsupportedDocumentError(mimeType);
        }
        return extractor;
    }

    /**
     * End-to-end pipeline: route → extract → normalize.
     *
     * @param buffer  Raw file bytes
     * @param fileName  File name, used for logging
     * @param mimeType  Detected MIME type
     */
    async process(
        buffer: Buffer,
        fileName: string,
        mimeType: string
    ): Promise<NormalizedDocument> {
        const extractor = this.route(mimeType);
        const raw = await extractor.extract(buffer, fileName);
        return normalizeDocument({ ...raw, mimeType });
    }
}
