export { createHealthRoutes } from "./health.js";
export { createVaultRoutes } from "./vault.js";
export { createTokenRoutes } from "./token.js";
export { createEventRoutes } from "./events.js";
