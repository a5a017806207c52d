/**
 * Well Extractor: Type Definitions
 *
 * Shared types and interfaces for the document-to-record pipeline.
 * Every extractor conforms to the `Extractor` interface and returns raw
 * page text; field parsing happens later on the joined text.
 */

// ---------------------------------------------------------------------------
// Page / Document Types
// ---------------------------------------------------------------------------

/** Where a page's text came from */
export type TextSource = "text-layer" | "ocr";

/** Text recovered from one page */
export interface PageText {
    /** Source page number (1-indexed) */
    page: number;
    text: string;
    source: TextSource;
}

export interface DocumentMetadata {
    pageCount: number;
    /** Pages whose text was produced by OCR */
    ocrPages: number[];
    /** Overall text origin; `none` when nothing was recovered */
    textSource: TextSource | "none";
}

/** Raw extractor output, before normalization */
export interface ExtractedDocument {
    /** Unique document identifier (UUID v4) */
    documentId: string;
    fileName: string;
    mimeType: string;
    metadata: DocumentMetadata;
    /** Non-empty pages in page order */
    pages: PageText[];
}

/** Extractor output after normalization, with pages joined into one text */
export interface NormalizedDocument extends ExtractedDocument {
    text: string;
}

// ---------------------------------------------------------------------------
// Extractor Interface
// ---------------------------------------------------------------------------

/**
 * Contract that every document extractor must implement.
 *
 * `extract` resolves with an empty page list rather than rejecting when a
 * document cannot be read; the router decides nothing about failures.
 */
export interface Extractor {
    /** Human-readable name of the extractor (for logging) */
    readonly name: string;

    /** Return `true` if this extractor can handle the given MIME type */
    supports(mimeType: string): boolean;

    /**
     * Read the raw file buffer and return its page text.
     *
     * Implementors should NOT call normalize; the router handles that.
     */
    extract(buffer: Buffer, fileName: string): Promise<ExtractedDocument>;
}

// ---------------------------------------------------------------------------
// OCR / Rasterization
// ---------------------------------------------------------------------------

/** Pluggable OCR backend */
export interface OcrProvider {
    /** Recognize text from an image buffer */
    recognize(imageBuffer: Buffer): Promise<string>;
    /** Release engine resources; the provider may be reused afterwards */
    dispose(): Promise<void>;
}

export interface RasterizeOptions {
    dpi: number;
}

/** Renders every page of a PDF into an image, in page order */
export interface Rasterizer {
    rasterize(pdf: Buffer, options: RasterizeOptions): Promise<Buffer[]>;
}

// ---------------------------------------------------------------------------
// Pipeline Results
// ---------------------------------------------------------------------------

export type WellAction = "inserted" | "updated";
export type StimulationAction = "inserted" | "updated" | "skipped";

export interface UpsertResult {
    api: string;
    wellId: number;
    well: WellAction;
    stimulation: StimulationAction;
}

export type SkipReason = "no-text" | "no-identifier";

/** Per-document result; one per discovered file, keyed by its path */
export type DocumentOutcome =
    | { status: "stored"; source: string; result: UpsertResult }
    | { status: "skipped"; source: string; reason: SkipReason }
    | { status: "failed"; source: string; error: string };

export interface BatchSummary {
    outcomes: DocumentOutcome[];
    stored: number;
    skipped: number;
    failed: number;
}
