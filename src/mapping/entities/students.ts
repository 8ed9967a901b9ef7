import { emailOrBlank, lowerCase, parseBoarderDay } from "../parsers.js";

import type { EntityDefinition } from "../../types/index.js";

export const students: EntityDefinition = {
  type: "students",
  label: "Student",
  endpoint: "students",
  keyField: "student_id",
  keySource: "IDSTUDENT",
  fields: [
    { field: "first_name", source: "NameFirst", required: true },
    { field: "last_name", source: "NameLast", required: true },
    { field: "nickname", source: "NameNickname" },
    { field: "email", source: "EMailSchool", translate: emailOrBlank },
    { field: "gender", source: "Sex" },
    { field: "grade", source: "GradeLevel", type: "id" },
    { field: "status", source: "Status", translate: lowerCase },
    { field: "is_boarder", source: "BoarderDay", translate: parseBoarderDay },
  ],
  references: [
    { field: "family_id", source: "IDFAMILY", target: "families", optional: true },
  ],
  deletable: true,
  inactive: { field: "status", value: "inactive" },
  defaultFile: "ksPERMRECS.xml.json",
};
