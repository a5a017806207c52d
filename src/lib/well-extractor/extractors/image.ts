/**
 * Well Extractor: Image Extractor
 *
 * Reports that arrive as bare scans (PNG, JPEG, TIFF) have no text layer at
 * all. The image is preprocessed with `sharp` and passed straight to the
 * OCR provider as a single page.
 */

import sharp from "sharp";
import { v4 as uuidv4 } from "uuid";
import type { ExtractedDocument, Extractor, OcrProvider, PageText } from "../types";

const SUPPORTED_TYPES = ["image/png", "image/jpeg", "image/tiff"];

export class ImageExtractor implements Extractor {
    readonly name = "ImageExtractor";

    constructor(private readonly ocrProvider: OcrProvider) { }

    supports(mimeType: string): boolean {
        return SUPPORTED_TYPES.includes(mimeType);
    }

    async extract(buffer: Buffer, fileName: string): Promise<ExtractedDocument> {
        const pages: PageText[] = [];

        try {
            // Preprocess: convert to greyscale PNG for better OCR accuracy
            const preprocessed = await sharp(buffer)
                .greyscale()
                .normalize()
                .png()
                .toBuffer();

            const recognizedText = (await this.ocrProvider.recognize(preprocessed)).trim();
            if (recognizedText.length > 0) {
                pages.push({ page: 1, text: recognizedText, source: "ocr" });
            }
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`[ImageExtractor] OCR failed for ${fileName}: ${message}`);
        }

        return {
            documentId: uuidv4(),
            fileName,
            mimeType: "image/unknown",
            metadata: {
                pageCount: 1,
                ocrPages: pages.map((page) => page.page),
                textSource: pages.length > 0 ? "ocr" : "none",
            },
            pages,
        };
    }
}
