import type { EntityDefinition } from "../../types/index.js";

export const courses: EntityDefinition = {
  type: "courses",
  label: "Course",
  endpoint: "courses",
  keyField: "course_id",
  keySource: "CourseNumber",
  fields: [
    { field: "course_name", source: "CourseName", required: true },
    { field: "course_name_short", source: "CourseNameShort" },
    { field: "course_name_transcript", source: "CourseNameTranscript" },
    { field: "division", source: "Division" },
    { field: "grade_level", source: "GradeLevel", type: "id" },
    { field: "department", source: "DepartmentName" },
    { field: "course_type", source: "CourseType" },
    { field: "credits", source: "Credits", type: "number" },
  ],
  references: [],
  deletable: true,
  defaultFile: "ksCOURSES.xml.json",
};
