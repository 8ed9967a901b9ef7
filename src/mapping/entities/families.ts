import { emailOrBlank } from "../parsers.js";

import type { EntityDefinition } from "../../types/index.js";

export const families: EntityDefinition = {
  type: "families",
  label: "Family",
  endpoint: "families",
  keyField: "family_id",
  keySource: "IDFAMILY",
  fields: [
    { field: "family_name", source: "FamilyName", required: true },
    { field: "address_line1", source: "Address1" },
    { field: "address_line2", source: "Address2" },
    { field: "city", source: "City" },
    { field: "state", source: "State" },
    { field: "postal_code", source: "Zip" },
    { field: "home_phone", source: "PhoneHome" },
    { field: "email", source: "EMailHome", translate: emailOrBlank },
  ],
  references: [],
  deletable: true,
  defaultFile: "ksFAMILIES.xml.json",
};
