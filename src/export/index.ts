export { ASSIGNMENT_COLUMNS, SCOPE_COLUMNS, csvEscape, toAssignmentsCsv, toScopesCsv } from "./csv.js";
