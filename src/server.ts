/**
 * Read-only JSON API over the well store.
 *
 *   GET /api/health        liveness probe
 *   GET /api/wells         every well with its stimulations
 *   GET /api/wells/:api    one well by API number
 *
 * Responses use snake_case keys; `date_stimulated` is calendar-date text.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import type { Database } from "./db/client";
import { getWellWithStimulations, listWells, type WellWithStimulations } from "./db/queries/wells";
import type { Stimulation } from "./db/schema";

export type ApiHandler = (req: IncomingMessage, res: ServerResponse) => Promise<void>;

const WELL_PATH_RE = /^\/api\/wells\/([^/]+)\/?$/;

function sendJson(res: ServerResponse, statusCode: number, payload: unknown): void {
    res.statusCode = statusCode;
    res.setHeader("content-type", "application/json; charset=utf-8");
    res.end(JSON.stringify(payload));
}

function sendError(res: ServerResponse, statusCode: number, message: string): void {
    sendJson(res, statusCode, { error: { message } });
}

export function serializeStimulation(stimulation: Stimulation) {
    return {
        id: stimulation.id,
        date_stimulated: stimulation.dateStimulated,
        stimulated_formation: stimulation.stimulatedFormation,
        top_ft: stimulation.topFt,
        bottom_ft: stimulation.bottomFt,
        stimulation_stages: stimulation.stimulationStages,
        volume: stimulation.volume,
        volume_units: stimulation.volumeUnits,
        type_treatment: stimulation.typeTreatment,
        acid: stimulation.acid,
        lbs_proppant: stimulation.lbsProppant,
        max_treatment_pressure: stimulation.maxTreatmentPressure,
        max_treatment_rate: stimulation.maxTreatmentRate,
        details: stimulation.details,
    };
}

export function serializeWell(well: WellWithStimulations) {
    return {
        id: well.id,
        api: well.api,
        operator: well.operator,
        well_name: well.wellName,
        job_number: well.jobNumber,
        job_type: well.jobType,
        county_state: well.countyState,
        shl: well.shl,
        latitude: well.latitude,
        longitude: well.longitude,
        datum: well.datum,
        stimulations: well.stimulations.map(serializeStimulation),
    };
}

function decodeSegment(segment: string): string | null {
    try {
        return decodeURIComponent(segment);
    } catch {
        return null;
    }
}

export function createApiHandler(db: Database): ApiHandler {
    return async (req, res) => {
        if (req.method !== "GET") {
            sendError(res, 405, "Method not allowed");
            return;
        }

        const { pathname } = new URL(req.url ?? "/", "http://localhost");

        try {
            if (pathname === "/api/health") {
                sendJson(res, 200, { status: "ok" });
                return;
            }

            if (pathname === "/api/wells" || pathname === "/api/wells/") {
                const wells = await listWells(db);
                sendJson(res, 200, wells.map(serializeWell));
                return;
            }

            const match = WELL_PATH_RE.exec(pathname);
            const api = match ? decodeSegment(match[1]) : null;
            if (api !== null) {
                const well = await getWellWithStimulations(db, api);
                if (!well) {
                    sendError(res, 404, `Well with API ${api} not found`);
                    return;
                }
                sendJson(res, 200, serializeWell(well));
                return;
            }

            sendError(res, 404, "Not found");
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`[Api] ${req.method} ${pathname} failed: ${message}`);
            sendError(res, 500, "Internal server error");
        }
    };
}

/** HTTP server bound to the handler; the caller calls `listen` */
export function createApiServer(db: Database): Server {
    const handler = createApiHandler(db);
    return createServer((req, res) => {
        handler(req, res).catch((error: unknown) => {
            const message = error instanceof Error ? error.message : String(error);
            console.error(`[Api] Unhandled error: ${message}`);
            if (!res.headersSent) {
                sendError(res, 500, "Internal server error");
            }
        });
    });
}
