// Report text shared by parser, store and pipeline tests

export const FULL_REPORT = [
    "Operator: Acme Energy LLC",
    "Well Name: Fed 12-3H",
    "API #: 42-123-45678",
    "Job Type: Frac",
    "County, State: Reeves, TX",
    "Latitude: 31.4567 Longitude: -103.4567",
    "Datum: NAD83",
    "Date Stimulated: 01/02/2020",
    "Stimulated Formation: Wolfcamp A",
    "Top (ft): 9,850",
    "Bottom (ft): 10,200",
    "Stimulation Stages: 24",
    "Volume (bbls): 125,000.5",
    "Type Treatment: Slickwater",
    "Acid: 15% HCl",
    "Lbs Proppant: 4,500,000",
    "Max Treatment Pressure: 8,900",
    "Max Treatment Rate: 95.5",
    "Details: Pumped 24 stages",
    "without issue.",
    "Comments: none",
].join("\n");

/** A report that names the well but carries no stimulation date */
export function undatedReport(api: string): string {
    return [`API No: ${api}`, "Operator: Beta Oil", "Stimulated Formation: Bone Spring"].join("\n");
}

/** Text with no identifier-shaped content at all */
export const NO_IDENTIFIER_REPORT = ["Operator: Acme Energy LLC", "Stimulation Stages: 12"].join("\n");
