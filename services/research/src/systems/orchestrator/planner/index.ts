export {
  buildPlan,
  extractSubjects,
  anglesFor,
  freezePlan,
  loadAngleCatalog,
  AngleCatalogSchema,
  type AngleCatalog,
  type Angle,
  type BuildPlanOptions,
  type QuerySubjects,
} from "./planner.js";
