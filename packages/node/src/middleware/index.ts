export { requestIdMiddleware, REQUEST_ID_HEADER } from "./request-id.js";
export { loggerMiddleware } from "./logger.js";
export type { RequestLogEntry } from "./logger.js";
export { authMiddleware, API_KEY_HEADER, CALLER_HEADER } from "./auth.js";
export type { AuthConfig } from "./auth.js";
export { handleError } from "./error-handler.js";
export { validateBody, formatZodErrors } from "./validate.js";
