import type { IncomingMessage, ServerResponse } from "node:http";
import { sql } from "drizzle-orm";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { WellStore } from "@/db/client";
import { parseStimulationData, parseWellInfo, upsertDocument } from "@/lib/well-extractor";
import { FULL_REPORT } from "@/test/fixtures";
import { createTestStore } from "@/test/store";
import { createApiHandler } from "./server";

interface MockResponseResult {
    res: ServerResponse;
    headers: Record<string, string>;
    readBody: () => string;
}

const createMockResponse = (): MockResponseResult => {
    const headers: Record<string, string> = {};
    let body = "";
    const res = {
        statusCode: 0,
        headersSent: false,
        setHeader(name: string, value: string) {
            headers[name.toLowerCase()] = value;
            return this;
        },
        end(chunk?: unknown) {
            if (typeof chunk === "string") {
                body += chunk;
            }
            return this;
        },
    } as unknown as ServerResponse;

    return { res, headers, readBody: () => body };
};

const request = (method: string, url: string) => ({ method, url }) as IncomingMessage;

async function seed(store: WellStore, text: string): Promise<void> {
    await upsertDocument(store.db, parseWellInfo(text), parseStimulationData(text), "seed.pdf");
}

describe("api handler", () => {
    let store: WellStore;

    beforeEach(async () => {
        store = await createTestStore();
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await store.close();
    });

    async function call(method: string, url: string) {
        const { res, headers, readBody } = createMockResponse();
        await createApiHandler(store.db)(request(method, url), res);
        return { status: res.statusCode, headers, body: JSON.parse(readBody()) as unknown };
    }

    it("answers the health check", async () => {
        const response = await call("GET", "/api/health");

        expect(response.status).toBe(200);
        expect(response.headers["content-type"]).toBe("application/json; charset=utf-8");
        expect(response.body).toEqual({ status: "ok" });
    });

    it("rejects other methods", async () => {
        const response = await call("POST", "/api/wells");

        expect(response.status).toBe(405);
        expect(response.body).toEqual({ error: { message: "Method not allowed" } });
    });

    it("lists wells by operator then well name with snake_case keys", async () => {
        await seed(store, "API #: 42-123-00002\nOperator: Zeta Oil\nWell Name: Alpha 1");
        await seed(store, FULL_REPORT);
        await seed(store, "API #: 42-123-00003\nOperator: Acme Energy LLC\nWell Name: Able 2");

        const response = await call("GET", "/api/wells");

        expect(response.status).toBe(200);
        const body = response.body as Array<Record<string, unknown>>;
        expect(body.map((well) => well.api)).toEqual(["42-123-00003", "42-123-45678", "42-123-00002"]);
        expect(body[1]).toMatchObject({
            well_name: "Fed 12-3H",
            county_state: "Reeves, TX",
            job_number: "N/A",
            latitude: 31.4567,
        });
    });

    it("returns one well with its stimulations", async () => {
        await seed(store, FULL_REPORT);

        const response = await call("GET", "/api/wells/42-123-45678");

        expect(response.status).toBe(200);
        expect(response.body).toMatchObject({
            api: "42-123-45678",
            operator: "Acme Energy LLC",
            stimulations: [
                {
                    date_stimulated: "2020-01-02",
                    stimulated_formation: "Wolfcamp A",
                    top_ft: 9850,
                    stimulation_stages: 24,
                    volume_units: "bbls",
                    lbs_proppant: 4500000,
                },
            ],
        });
    });

    it("returns 404 for an unknown well", async () => {
        const response = await call("GET", "/api/wells/00-000-00000");

        expect(response.status).toBe(404);
        expect(response.body).toEqual({ error: { message: "Well with API 00-000-00000 not found" } });
    });

    it("returns 404 for unknown paths", async () => {
        const response = await call("GET", "/api/unknown");

        expect(response.status).toBe(404);
        expect(response.body).toEqual({ error: { message: "Not found" } });
    });

    it("reports store failures as 500", async () => {
        vi.spyOn(console, "error").mockImplementation(() => { });
        await seed(store, FULL_REPORT);
        await store.db.execute(sql`DROP TABLE stimulation_data`);

        const response = await call("GET", "/api/wells");

        expect(response.status).toBe(500);
        expect(response.body).toEqual({ error: { message: "Internal server error" } });
        expect(console.error).toHaveBeenCalledOnce();
    });
});
