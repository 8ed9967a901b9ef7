import { lowerCase, parseDate } from "../parsers.js";

import type { EntityDefinition, Payload } from "../../types/index.js";

// Dates are YYYY-MM-DD after parsing, so string order is date order
function checkDateRange(payload: Payload): string | undefined {
  const start = payload.start_date;
  const end = payload.end_date;

  if (typeof start === "string" && typeof end === "string" && end !== "" && end < start) {
    return `end_date ${end} is before start_date ${start}`;
  }
  return undefined;
}

export const registrations: EntityDefinition = {
  type: "registrations",
  label: "Registration",
  endpoint: "registrations",
  keyField: "registration_id",
  keySource: "IDREGISTRATION",
  fields: [
    {
      field: "start_date",
      source: "DateStart",
      required: true,
      translate: parseDate,
    },
    { field: "end_date", source: "DateEnd", translate: parseDate, blank: null },
    { field: "status", source: "Status", translate: lowerCase },
  ],
  references: [
    { field: "student_id", source: "IDSTUDENT", target: "students" },
    { field: "section_id", source: "IDSECTION", target: "sections" },
  ],
  deletable: true,
  check: checkDateRange,
  defaultFile: "ksREGISTRATIONS.xml.json",
};
