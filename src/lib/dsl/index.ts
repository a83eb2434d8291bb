export { TaskCatalog, parseCatalogData, DEFAULT_TASKS_PATH } from "./catalog";
export type { CatalogData } from "./catalog";
export { createExecutor, getAvailableDsls } from "./registry";
export { EchoExecutor } from "./echo";
export { CalcExecutor, evaluateCalc } from "./calc";
export { positionalSimilarity } from "./similarity";
