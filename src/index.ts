export { DISCOVERY_SCHEMES, NON_HTTP_SCHEMES, isDiscoveryScheme, isNonHttpScheme } from "./domain/identity/discoveryScheme";
export type { DiscoveryScheme } from "./domain/identity/discoveryScheme";
export { createStructuredUri } from "./domain/identity/structuredUri";
export type { NormalizedResource, StructuredUri } from "./domain/identity/structuredUri";
export { normalizeResource } from "./domain/policies/normalizeResource";
export { serializeUri } from "./domain/policies/serializeUri";
export { buildWebfingerRequestUrl, OIDC_ISSUER_REL } from "./domain/policies/webfingerTarget";
export { MAX_PORT } from "./domain/policies/portPolicy";

export { ResourceNormalizer } from "./application/normalizer/resourceNormalizer";
export type { ResourceNormalizerDeps } from "./application/normalizer/resourceNormalizer";
export { createNormalizerContainer, TOKENS } from "./di/normalizerContainer";

export { LogService } from "./log/logService";
export type { LogEntry, LogLevel, Logger } from "./log/logService";
export { DEFAULT_SETTINGS, normalizeSettings } from "./settingsStore";
export type { NormalizerSettings } from "./types";

export { APP_ERROR } from "./shared/appErrorCodes";
export type { AppErrorCode } from "./shared/appErrorCodes";
export { AppError, isAppError } from "./shared/appError";
export { err, isErr, isOk, ok } from "./shared/result";
export type { AppErrorDto, ErrorCode, Result } from "./shared/result";
