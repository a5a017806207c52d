/**
 * Well Extractor: PDF Rasterizer
 *
 * Renders PDF pages to PNG with poppler's `pdftoppm`. Pages are written to
 * a private temporary directory, read back in page order and removed.
 */

import { execFile } from "node:child_process";
import { mkdtemp, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { promisify } from "node:util";
import { CorruptDocumentError, ToolchainMissingError } from "../../errors";
import type { RasterizeOptions, Rasterizer } from "../types";

const execFileAsync = promisify(execFile);

const PAGE_FILE_RE = /^page-(\d+)\.png$/;

export interface PdftoppmOptions {
    /** Directory containing the poppler binaries; `PATH` is searched when unset */
    popplerPath?: string;
}

function isMissingCommand(error: unknown): boolean {
    return (
        typeof error === "object" &&
        error !== null &&
        "code" in error &&
        error.code === "ENOENT"
    );
}

export class PdftoppmRasterizer implements Rasterizer {
    private readonly command: string;

    constructor(options: PdftoppmOptions = {}) {
        this.command = options.popplerPath
            ? path.join(options.popplerPath, "pdftoppm")
            : "pdftoppm";
    }

    /**
     * @throws ToolchainMissingError when pdftoppm cannot be started
     * @throws CorruptDocumentError when pdftoppm rejects the document
     */
    async rasterize(pdf: Buffer, options: RasterizeOptions): Promise<Buffer[]> {
        const workDir = await mkdtemp(path.join(tmpdir(), "well-raster-"));
        try {
            const input = path.join(workDir, "input.pdf");
            await writeFile(input, pdf);

            try {
                await execFileAsync(this.command, [
                    "-png",
                    "-r",
                    String(options.dpi),
                    input,
                    path.join(workDir, "page"),
                ]);
            } catch (error) {
                if (isMissingCommand(error)) {
                    throw new ToolchainMissingError(this.command);
                }
                const message = error instanceof Error ? error.message : String(error);
                throw new CorruptDocumentError(`pdftoppm failed: ${message}`);
            }

            // pdftoppm zero-pads page numbers by page count; sort numerically
            const pages = (await readdir(workDir))
                .map((name) => ({ name, match: PAGE_FILE_RE.exec(name) }))
                .filter((entry): entry is { name: string; match: RegExpExecArray } => entry.match !== null)
                .sort((a, b) => Number(a.match[1]) - Number(b.match[1]));

            return await Promise.all(pages.map((entry) => readFile(path.join(workDir, entry.name))));
        } finally {
            await rm(workDir, { recursive: true, force: true });
        }
    }
}
