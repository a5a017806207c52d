/**
 * Well Extractor: Report Parsing
 *
 * Field tables for the two entities and the functions that run them over a
 * document's text. Labels are matched loosely so minor wording differences
 * between report templates do not break extraction.
 */

import type { NewStimulation, NewWell } from "../../db/schema";
import {
    coerceFields,
    dateField,
    extractFields,
    extractLatLong,
    extractMultilineBlock,
    identifierField,
    integerField,
    numberField,
    textField,
    type FieldTable,
    type FieldValues,
} from "./fields";
import { recoverIdentifier } from "./identifier";
import { normalizeText } from "./normalize";

type Columns<T> = { [K in keyof T]-?: NonNullable<T[K]> };

/** Every writable well column, non-null */
export type WellValues = Columns<Omit<NewWell, "id">>;
/** Every writable stimulation column except the owning well, non-null */
export type StimulationValues = Columns<Omit<NewStimulation, "id" | "wellId">>;

export type WellFields = FieldValues<WellValues>;
export type StimulationFields = FieldValues<StimulationValues>;

export const WELL_FIELDS: FieldTable<WellValues> = {
    api: identifierField(
        [
            /API(?:\s*Number|\s*No\.?|\s*#)?[:#\s-]*([0-9-]{5,})/i,
            /API(?:\s*Number|\s*No\.?|\s*#)?[:#\s-]*([0-9\s-]{5,})/i,
        ],
        64
    ),
    operator: textField([/Operator(?: Name)?[:#\s-]+(.+)/i, /Operator\s+(.*)/i], 255),
    wellName: textField(
        [/Well(?: Name)?(?: & Number)?[:#\s-]+(.+)/i, /Well\s+Name\s*\/\s*Number[:#\s-]+(.+)/i],
        255
    ),
    jobNumber: textField([/(?:[A-Za-z]+\s*)?Job\s*(?:#|No\.?|Number)[:#\s-]+(\S+)/i], 64),
    jobType: textField([/Job\s*Type[:#\s-]+(.+)/i, /Type of Job[:#\s-]+(.+)/i], 255),
    countyState: textField([/County,?\s*State[:#\s-]+(.+)/i, /County[:#\s-]+(.+)/i], 255),
    shl: textField([/Surface\s*Hole\s*Location\s*\(SHL\)[:#\s-]+(.+)/i]),
    latitude: numberField([/Latitude[:#\s-]+(-?\d+\.\d+)/i, /Lat(?:itude)?[:#\s-]+(-?\d+\.\d+)/i]),
    longitude: numberField([/Longitude[:#\s-]+(-?\d+\.\d+)/i, /Long(?:itude)?[:#\s-]+(-?\d+\.\d+)/i]),
    datum: textField([/Datum[:#\s-]+(.+)/i], 255),
};

export const STIMULATION_FIELDS: FieldTable<StimulationValues> = {
    dateStimulated: dateField([/Date\s*Stimulated[:#\s-]+(.+)/i, /Stimulated\s*Date[:#\s-]+(.+)/i]),
    stimulatedFormation: textField(
        [/Stimulated\s*Formation[:#\s-]+(.+)/i, /Formation[:#\s-]+(.+)/i],
        255
    ),
    topFt: numberField([/Top\s*\(ft\)[:#\s-]+([\d,]+)/i, /Top[:#\s-]+([\d,]+)\s*ft/i]),
    bottomFt: numberField([/Bottom\s*\(ft\)[:#\s-]+([\d,]+)/i, /Bottom[:#\s-]+([\d,]+)\s*ft/i]),
    stimulationStages: integerField([/Stimulation\s*Stages[:#\s-]+(\d+)/i, /Stages[:#\s-]+(\d+)/i]),
    volume: numberField([
        /Volume\s*\(?(?:bbls|gal|m3)?\)?[:#\s-]+([\d,]+(?:\.\d+)?)/i,
        /Total\s*Volume[:#\s-]+([\d,]+(?:\.\d+)?)/i,
    ]),
    volumeUnits: textField([/Volume\s*(?:\(([^)]+)\))/i, /Volume\s*Units[:#\s-]+(\w+)/i], 32),
    typeTreatment: textField([/Type\s*Treatment[:#\s-]+(.+)/i, /Treatment\s*Type[:#\s-]+(.+)/i], 255),
    acid: textField([/Acid[:#\s-]+(.+)/i, /Acid\s*Type[:#\s-]+(.+)/i], 255),
    lbsProppant: numberField([/Lbs?\.?\s*Proppant[:#\s-]+([\d,]+)/i, /Proppant[:#\s-]+([\d,]+)/i]),
    maxTreatmentPressure: numberField([/Max(?:imum)?\s*Treatment\s*Pressure[:#\s-]+([\d,]+)/i]),
    maxTreatmentRate: numberField([/Max(?:imum)?\s*Treatment\s*Rate[:#\s-]+([\d,]+(?:\.\d+)?)/i]),
    details: textField([/Details[:#\s-]+(.+)/i], 65500),
};

/**
 * Parse well metadata.
 *
 * When no labelled API number is found, the identifier is recovered from
 * bare digit runs anywhere in the text.
 */
export function parseWellInfo(text: string): WellFields {
    const normalized = normalizeText(text);
    const raw = extractFields(normalized, WELL_FIELDS);

    const latLong = extractLatLong(normalized);
    if (latLong) {
        raw.latitude = latLong.latitude;
        raw.longitude = latLong.longitude;
    }

    if (!raw.api) {
        const recovered = recoverIdentifier(normalized);
        if (recovered) {
            raw.api = recovered;
        }
    }

    return coerceFields(raw, WELL_FIELDS);
}

/** Parse stimulation data; a multi-line Details block beats the single-line match */
export function parseStimulationData(text: string): StimulationFields {
    const normalized = normalizeText(text);
    const raw = extractFields(normalized, STIMULATION_FIELDS);

    const details = extractMultilineBlock(normalized, "Details");
    if (details) {
        raw.details = details;
    }

    return coerceFields(raw, STIMULATION_FIELDS);
}
