import type { EntityDefinition } from "../../types/index.js";

export const sections: EntityDefinition = {
  type: "sections",
  label: "Section",
  endpoint: "sections",
  keyField: "section_id",
  keySource: "IDSECTION",
  fields: [
    { field: "term", source: "Term", required: true },
    { field: "period", source: "Period", type: "id" },
    { field: "room", source: "Room" },
  ],
  references: [
    { field: "course_id", source: "CourseNumber", target: "courses" },
    { field: "teacher_id", source: "IDTEACHER", target: "teachers" },
  ],
  deletable: true,
  defaultFile: "ksSECTIONS.xml.json",
};
