export { createHealthRoutes } from "./health.js";
export { createVaultRoutes } from "./vault.js";
export { createStrategyRoutes } from "./strategy.js";
export { createSimRoutes } from "./sim.js";
