import { lowerCase } from "../parsers.js";

import type { EntityDefinition } from "../../types/index.js";

export const enrollments: EntityDefinition = {
  type: "enrollments",
  label: "Enrollment",
  endpoint: "enrollments",
  keyField: "enrollment_id",
  keySource: "IDENROLLMENT",
  fields: [
    { field: "role", source: "Role", translate: lowerCase },
    { field: "status", source: "Status", translate: lowerCase },
  ],
  references: [
    { field: "student_id", source: "IDSTUDENT", target: "students" },
    { field: "section_id", source: "IDSECTION", target: "sections" },
  ],
  deletable: true,
  defaultFile: "ksENROLLMENTS.xml.json",
};
