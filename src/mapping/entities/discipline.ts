import { lowerCase, parseDate } from "../parsers.js";

import type { EntityDefinition } from "../../types/index.js";

/**
 * Discipline records are append-only on the remote side: records missing
 * from the extract are never removed.
 */
export const discipline: EntityDefinition = {
  type: "discipline",
  label: "Discipline record",
  endpoint: "discipline-records",
  keyField: "record_id",
  keySource: "IDDISCIPLINE",
  fields: [
    {
      field: "incident_date",
      source: "DateIncident",
      required: true,
      translate: parseDate,
    },
    {
      field: "category",
      source: "Category",
      required: true,
      translate: lowerCase,
    },
    { field: "description", source: "Description" },
  ],
  references: [
    { field: "student_id", source: "IDSTUDENT", target: "students" },
  ],
  deletable: false,
  defaultFile: "ksDISCIPLINE.xml.json",
};
