import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { sql } from "drizzle-orm";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { WellStore } from "@/db/client";
import { stimulations, wells } from "@/db/schema";
import { ConfigError } from "@/lib/errors";
import { FULL_REPORT, NO_IDENTIFIER_REPORT } from "@/test/fixtures";
import { createTestStore } from "@/test/store";
import { discoverDocuments, processDocument, runBatch, type DocumentProcessor } from "./pipeline";
import type { NormalizedDocument } from "./types";

/** Serves canned text by file name; unknown files come back blank */
function fakeProcessor(texts: Record<string, string>): DocumentProcessor {
    return {
        process: vi.fn(async (_buffer: Buffer, fileName: string, mimeType: string): Promise<NormalizedDocument> => {
            const text = texts[fileName] ?? "";
            return {
                documentId: `doc-${fileName}`,
                fileName,
                mimeType,
                metadata: { pageCount: 1, ocrPages: [], textSource: text ? "text-layer" : "none" },
                pages: text ? [{ page: 1, text, source: "text-layer" }] : [],
                text,
            };
        }),
    };
}

describe("pipeline", () => {
    let folder: string;
    let store: WellStore;

    beforeEach(async () => {
        folder = await mkdtemp(path.join(tmpdir(), "well-pipeline-"));
        store = await createTestStore();
        vi.spyOn(console, "debug").mockImplementation(() => { });
        vi.spyOn(console, "info").mockImplementation(() => { });
        vi.spyOn(console, "warn").mockImplementation(() => { });
        vi.spyOn(console, "error").mockImplementation(() => { });
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await store.close();
        await rm(folder, { recursive: true, force: true });
    });

    async function addFile(relativePath: string): Promise<string> {
        const fullPath = path.join(folder, relativePath);
        await mkdir(path.dirname(fullPath), { recursive: true });
        await writeFile(fullPath, "%PDF-1.4 placeholder");
        return fullPath;
    }

    describe("discoverDocuments", () => {
        it("walks subfolders, keeps recognized extensions and sorts by path", async () => {
            await addFile("b.pdf");
            await addFile("a/c.PDF");
            await addFile("scan.png");
            await addFile("notes.txt");

            expect(await discoverDocuments(folder)).toEqual([
                path.join(folder, "a", "c.PDF"),
                path.join(folder, "b.pdf"),
                path.join(folder, "scan.png"),
            ]);
        });

        it("rejects a missing folder", async () => {
            await expect(discoverDocuments(path.join(folder, "missing"))).rejects.toBeInstanceOf(ConfigError);
        });
    });

    describe("processDocument", () => {
        it("stores a document with an identifier", async () => {
            const filePath = await addFile("report.pdf");

            const outcome = await processDocument(store.db, fakeProcessor({ "report.pdf": FULL_REPORT }), filePath);

            expect(outcome).toMatchObject({
                status: "stored",
                source: filePath,
                result: { api: "42-123-45678", well: "inserted", stimulation: "inserted" },
            });
        });

        it("stores a garbled stage count as the numeric default", async () => {
            const filePath = await addFile("garbled.pdf");
            const text = "API #: 42-123-45678\nStimulation Stages: 99999999999";

            const outcome = await processDocument(store.db, fakeProcessor({ "garbled.pdf": text }), filePath);

            expect(outcome.status).toBe("stored");
            const rows = await store.db.select({ stages: stimulations.stimulationStages }).from(stimulations);
            expect(rows).toEqual([{ stages: 0 }]);
        });

        it("passes the MIME type derived from the extension", async () => {
            const filePath = await addFile("scan.TIFF");
            const processor = fakeProcessor({});

            await processDocument(store.db, processor, filePath);

            expect(processor.process).toHaveBeenCalledWith(expect.any(Buffer), "scan.TIFF", "image/tiff");
        });

        it("skips a document without text", async () => {
            const filePath = await addFile("blank.pdf");

            const outcome = await processDocument(store.db, fakeProcessor({}), filePath);

            expect(outcome).toEqual({ status: "skipped", source: filePath, reason: "no-text" });
        });

        it("treats an extraction error as no text", async () => {
            const filePath = await addFile("broken.pdf");
            const processor: DocumentProcessor = {
                process: vi.fn(async () => {
                    throw new Error("unexpected token");
                }),
            };

            const outcome = await processDocument(store.db, processor, filePath);

            expect(outcome).toEqual({ status: "skipped", source: filePath, reason: "no-text" });
            expect(console.error).toHaveBeenCalledWith(
                `[Pipeline] Extraction failed for ${filePath}: unexpected token`
            );
        });

        it("skips a document without an identifier and writes nothing", async () => {
            const filePath = await addFile("anon.pdf");

            const outcome = await processDocument(store.db, fakeProcessor({ "anon.pdf": NO_IDENTIFIER_REPORT }), filePath);

            expect(outcome).toEqual({ status: "skipped", source: filePath, reason: "no-identifier" });
            expect(await store.db.select().from(wells)).toHaveLength(0);
        });
    });

    describe("runBatch", () => {
        it("processes every document in order and summarizes", async () => {
            await addFile("1-report.pdf");
            await addFile("2-blank.pdf");
            await addFile("3-anon.pdf");
            await addFile("4-report-again.pdf");
            const processor = fakeProcessor({
                "1-report.pdf": FULL_REPORT,
                "3-anon.pdf": NO_IDENTIFIER_REPORT,
                "4-report-again.pdf": FULL_REPORT,
            });

            const summary = await runBatch(store.db, processor, folder);

            expect(summary.outcomes.map((outcome) => outcome.status)).toEqual(["stored", "skipped", "skipped", "stored"]);
            expect(summary).toMatchObject({ stored: 2, skipped: 2, failed: 0 });
            expect(await store.db.select().from(wells)).toHaveLength(1);
            expect(await store.db.select().from(stimulations)).toHaveLength(1);
        });

        it("isolates store failures per document", async () => {
            await addFile("1-report.pdf");
            await addFile("2-blank.pdf");
            await store.db.execute(sql`DROP TABLE stimulation_data`);

            const summary = await runBatch(store.db, fakeProcessor({ "1-report.pdf": FULL_REPORT }), folder);

            expect(summary.outcomes.map((outcome) => outcome.status)).toEqual(["failed", "skipped"]);
            expect(summary.failed).toBe(1);
            expect(await store.db.select().from(wells)).toHaveLength(0);
        });

        it("stops at the first store failure with failFast", async () => {
            await addFile("1-report.pdf");
            await store.db.execute(sql`DROP TABLE stimulation_data`);

            await expect(
                runBatch(store.db, fakeProcessor({ "1-report.pdf": FULL_REPORT }), folder, { failFast: true })
            ).rejects.toThrow();
        });

        it("warns when the folder holds no documents", async () => {
            const summary = await runBatch(store.db, fakeProcessor({}), folder);

            expect(summary.outcomes).toEqual([]);
            expect(console.warn).toHaveBeenCalledWith(`[Pipeline] No documents found in ${folder}`);
        });
    });
});
