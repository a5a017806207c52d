/**
 * Well and stimulation tables.
 *
 * `wells.api` is the deduplication key for wells; stimulations are matched
 * on (`well_id`, `date_stimulated`) when a date is known. Stimulation rows
 * are owned by their well and removed with it.
 *
 * @module db/schema
 */

import { relations } from "drizzle-orm";
import {
    date,
    doublePrecision,
    index,
    integer,
    pgTable,
    serial,
    text,
    varchar,
} from "drizzle-orm/pg-core";

export const wells = pgTable("wells", {
    id: serial("id").primaryKey(),
    api: varchar("api", { length: 64 }).notNull().unique(),
    operator: varchar("operator", { length: 255 }),
    wellName: varchar("well_name", { length: 255 }),
    jobNumber: varchar("job_number", { length: 64 }),
    jobType: varchar("job_type", { length: 255 }),
    countyState: varchar("county_state", { length: 255 }),
    shl: text("shl"),
    latitude: doublePrecision("latitude"),
    longitude: doublePrecision("longitude"),
    datum: varchar("datum", { length: 255 }),
});

export const stimulations = pgTable(
    "stimulation_data",
    {
        id: serial("id").primaryKey(),
        wellId: integer("well_id")
            .notNull()
            .references(() => wells.id, { onDelete: "cascade" }),
        // Calendar date only; serialized as YYYY-MM-DD
        dateStimulated: date("date_stimulated", { mode: "string" }),
        stimulatedFormation: varchar("stimulated_formation", { length: 255 }),
        topFt: doublePrecision("top_ft"),
        bottomFt: doublePrecision("bottom_ft"),
        stimulationStages: integer("stimulation_stages"),
        volume: doublePrecision("volume"),
        volumeUnits: varchar("volume_units", { length: 32 }),
        typeTreatment: varchar("type_treatment", { length: 255 }),
        acid: varchar("acid", { length: 255 }),
        lbsProppant: doublePrecision("lbs_proppant"),
        maxTreatmentPressure: doublePrecision("max_treatment_pressure"),
        maxTreatmentRate: doublePrecision("max_treatment_rate"),
        details: text("details"),
    },
    (table) => ({
        wellDateIdx: index("stimulation_data_well_date_idx").on(table.wellId, table.dateStimulated),
    })
);

export const wellsRelations = relations(wells, ({ many }) => ({
    stimulations: many(stimulations),
}));

export const stimulationsRelations = relations(stimulations, ({ one }) => ({
    well: one(wells, {
        fields: [stimulations.wellId],
        references: [wells.id],
    }),
}));

export type Well = typeof wells.$inferSelect;
export type NewWell = typeof wells.$inferInsert;
export type Stimulation = typeof stimulations.$inferSelect;
export type NewStimulation = typeof stimulations.$inferInsert;
