export type { AppEnv } from "./api-contract.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";
export { RequestValidationError, createErrorEnvelope } from "./error.js";
export * from "./dto.js";
