import { EventEmitter } from "node:events";
import { afterEach, describe, expect, it, vi } from "vitest";

const { closeStore } = vi.hoisted(() => ({
    closeStore: vi.fn(async () => { }),
}));

vi.mock("@/db/client", () => ({
    openStore: vi.fn(async () => ({ db: {}, close: closeStore })),
}));

vi.mock("@/server", () => ({
    createApiServer: vi.fn(() => {
        const server = new EventEmitter();
        return Object.assign(server, {
            listen: () => {
                queueMicrotask(() => server.emit("error", new Error("listen EADDRINUSE: address already in use")));
                return server;
            },
        });
    }),
}));

import { main, parseCliArgs } from "./cli";
import { ConfigError } from "./lib/errors";

describe("parseCliArgs", () => {
    it("defaults to ingest with settings from the environment", () => {
        expect(parseCliArgs([])).toEqual({ command: "ingest", folder: undefined, failFast: false, dpi: undefined });
    });

    it("reads the ingest folder and flags", () => {
        expect(parseCliArgs(["ingest", "./reports", "--fail-fast", "--dpi", "200"])).toEqual({
            command: "ingest",
            folder: "./reports",
            failFast: true,
            dpi: 200,
        });
    });

    it("reads the serve port", () => {
        expect(parseCliArgs(["serve", "--port", "8080"])).toEqual({ command: "serve", port: 8080 });
    });

    it("rejects malformed numbers", () => {
        expect(() => parseCliArgs(["--dpi", "0"])).toThrow("--dpi must be an integer between 72 and 1200");
        expect(() => parseCliArgs(["serve", "--port", "http"])).toThrow(ConfigError);
    });

    it("holds --dpi to the OCR_DPI range", () => {
        expect(parseCliArgs(["--dpi", "72"])).toMatchObject({ dpi: 72 });
        expect(parseCliArgs(["--dpi", "1200"])).toMatchObject({ dpi: 1200 });
        expect(() => parseCliArgs(["--dpi", "1201"])).toThrow("--dpi must be an integer between 72 and 1200");
        expect(() => parseCliArgs(["--dpi", "50"])).toThrow(ConfigError);
    });

    it("rejects unknown commands and flags", () => {
        expect(() => parseCliArgs(["export"])).toThrow("Unknown command: export");
        expect(() => parseCliArgs(["--verbose"])).toThrow(ConfigError);
    });
});

describe("main serve", () => {
    afterEach(() => {
        vi.clearAllMocks();
    });

    it("closes the store when the server cannot listen", async () => {
        await expect(main(["serve", "--port", "5000"])).rejects.toThrow("listen EADDRINUSE");
        expect(closeStore).toHaveBeenCalledOnce();
    });
});
