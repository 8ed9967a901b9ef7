import { emailOrBlank, parseBoolean } from "../parsers.js";

import type { EntityDefinition } from "../../types/index.js";

export const teachers: EntityDefinition = {
  type: "teachers",
  label: "Teacher",
  endpoint: "teachers",
  keyField: "teacher_id",
  keySource: "IDTEACHER",
  fields: [
    { field: "unique_name", source: "NameUnique", required: true },
    { field: "first_name", source: "NameFirst", required: true },
    { field: "last_name", source: "NameLast", required: true },
    { field: "prefix", source: "NamePrefix" },
    { field: "email", source: "EmailSchool", translate: emailOrBlank },
    { field: "department", source: "DepartmentName" },
    {
      field: "active",
      source: "Active Employee",
      required: true,
      translate: parseBoolean,
    },
  ],
  references: [],
  deletable: true,
  inactive: { field: "active", value: false },
  defaultFile: "ksTEACHERS.xml.json",
};
