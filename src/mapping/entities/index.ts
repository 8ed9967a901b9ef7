// Entity definitions - Re-exports
import { courses } from "./courses.js";
import { discipline } from "./discipline.js";
import { enrollments } from "./enrollments.js";
import { families } from "./families.js";
import { registrations } from "./registrations.js";
import { sections } from "./sections.js";
import { students } from "./students.js";
import { teachers } from "./teachers.js";

import type { EntityDefinition } from "../../types/index.js";

export {
  courses,
  discipline,
  enrollments,
  families,
  registrations,
  sections,
  students,
  teachers,
};

/** Every entity type the sync knows about, in declaration order */
export const ENTITY_DEFINITIONS: readonly EntityDefinition[] = [
  families,
  teachers,
  students,
  courses,
  sections,
  registrations,
  enrollments,
  discipline,
];
