/**
 * Well Extractor: Public API
 *
 * Barrel export; import everything from `@/lib/well-extractor`.
 */

export { ExtractorRouter, mimeTypeFor } from "./router";
export { ImageExtractor } from "./extractors/image";
export { TesseractOcrProvider } from "./extractors/ocr-provider";
export { PdfExtractor, DEFAULT_OCR_DPI } from "./extractors/pdf";
export { PdftoppmRasterizer } from "./extractors/rasterizer";
export { normalizeText, normalizeDocument } from "./normalize";
export { parseStimulationData, parseWellInfo, STIMULATION_FIELDS, WELL_FIELDS } from "./parse";
export { recoverIdentifier } from "./identifier";
export { upsertDocument } from "./upsert";
export { discoverDocuments, processDocument, runBatch } from "./pipeline";
export type { BatchOptions, DocumentProcessor } from "./pipeline";
export type { StimulationFields, WellFields } from "./parse";
export type {
    BatchSummary,
    DocumentMetadata,
    DocumentOutcome,
    ExtractedDocument,
    Extractor,
    NormalizedDocument,
    OcrProvider,
    PageText,
    Rasterizer,
    UpsertResult,
} from "./types";
