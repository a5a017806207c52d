/**
 * Well Extractor: Upsert Engine
 *
 * Writes one document's well and stimulation fields as a single
 * transaction. Wells are matched on the API number; stimulations are
 * matched on (well, date stimulated) when the document carries a date and
 * are appended otherwise.
 */

import { eq } from "drizzle-orm";
import type { Database } from "../../db/client";
import { findStimulationByDate, findWellByApi } from "../../db/queries/wells";
import { stimulations, wells } from "../../db/schema";
import { applyMissingDefaults, toPayload } from "./fields";
import {
    STIMULATION_FIELDS,
    WELL_FIELDS,
    type StimulationFields,
    type StimulationValues,
    type WellFields,
    type WellValues,
} from "./parse";
import type { StimulationAction, UpsertResult, WellAction } from "./types";

/**
 * Persist one document.
 *
 * Resolves `null` without touching the store when no API number was parsed.
 * Store errors are not caught here; the transaction rolls back and the
 * error propagates to the caller.
 *
 * @param source  Document name, used in log lines
 */
export async function upsertDocument(
    db: Database,
    wellFields: WellFields,
    stimulationFields: StimulationFields,
    source: string
): Promise<UpsertResult | null> {
    const { api, ...wellPayload } = toPayload<WellValues>(applyMissingDefaults(wellFields, WELL_FIELDS));
    if (!api) {
        console.warn(`[Upsert] Skipping ${source} because no API number was parsed`);
        return null;
    }

    const stimulationPayload = toPayload<StimulationValues>(
        applyMissingDefaults(stimulationFields, STIMULATION_FIELDS)
    );

    return db.transaction(async (tx) => {
        let wellId: number;
        let wellAction: WellAction;

        const existing = await findWellByApi(tx, api);
        if (existing) {
            if (Object.keys(wellPayload).length > 0) {
                await tx.update(wells).set(wellPayload).where(eq(wells.id, existing.id));
            }
            wellId = existing.id;
            wellAction = "updated";
        } else {
            const [inserted] = await tx
                .insert(wells)
                .values({ ...wellPayload, api })
                .returning({ id: wells.id });
            wellId = inserted.id;
            wellAction = "inserted";
        }

        let stimulationAction: StimulationAction = "skipped";
        if (Object.keys(stimulationPayload).length > 0) {
            const match = stimulationPayload.dateStimulated
                ? await findStimulationByDate(tx, wellId, stimulationPayload.dateStimulated)
                : null;

            if (match) {
                await tx.update(stimulations).set(stimulationPayload).where(eq(stimulations.id, match.id));
                stimulationAction = "updated";
            } else {
                // No date means no identity: always a new row
                await tx.insert(stimulations).values({ ...stimulationPayload, wellId });
                stimulationAction = "inserted";
            }
        }

        return { api, wellId, well: wellAction, stimulation: stimulationAction };
    });
}
