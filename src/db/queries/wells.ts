/**
 * Read-side queries used by the HTTP API and by the upsert engine.
 *
 * @module db/queries/wells
 */

import { and, asc, eq, inArray } from "drizzle-orm";
import type { Database } from "../client";
import { stimulations, wells, type Stimulation, type Well } from "../schema";

export interface WellWithStimulations extends Well {
    stimulations: Stimulation[];
}

/** Exact-match lookup on the well identifier */
export async function findWellByApi(db: Database, api: string): Promise<Well | null> {
    const [well] = await db.select().from(wells).where(eq(wells.api, api)).limit(1);
    return well ?? null;
}

/** Stimulation row for a well on a given calendar date, if one exists */
export async function findStimulationByDate(
    db: Database,
    wellId: number,
    dateStimulated: string
): Promise<Stimulation | null> {
    const [stimulation] = await db
        .select()
        .from(stimulations)
        .where(and(eq(stimulations.wellId, wellId), eq(stimulations.dateStimulated, dateStimulated)))
        .orderBy(asc(stimulations.id))
        .limit(1);
    return stimulation ?? null;
}

export async function getWellWithStimulations(
    db: Database,
    api: string
): Promise<WellWithStimulations | null> {
    const well = await findWellByApi(db, api);
    if (!well) {
        return null;
    }

    const rows = await db
        .select()
        .from(stimulations)
        .where(eq(stimulations.wellId, well.id))
        .orderBy(asc(stimulations.id));

    return { ...well, stimulations: rows };
}

/** All wells ordered by operator, then well name, each with its stimulations */
export async function listWells(db: Database): Promise<WellWithStimulations[]> {
    const rows = await db
        .select()
        .from(wells)
        .orderBy(asc(wells.operator), asc(wells.wellName), asc(wells.id));

    if (rows.length === 0) {
        return [];
    }

    const children = await db
        .select()
        .from(stimulations)
        .where(
            inArray(
                stimulations.wellId,
                rows.map((row) => row.id)
            )
        )
        .orderBy(asc(stimulations.id));

    const byWell = new Map<number, Stimulation[]>();
    for (const child of children) {
        const bucket = byWell.get(child.wellId) ?? [];
        bucket.push(child);
        byWell.set(child.wellId, bucket);
    }

    return rows.map((row) => ({ ...row, stimulations: byWell.get(row.id) ?? [] }));
}
