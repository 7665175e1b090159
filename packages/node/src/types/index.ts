/**
 * Type barrel — re-exports all public types from @resonance/node.
 */

// DTOs
export {
  RecordMarkerSchema,
  ExpectConfirmationSchema,
  ListMarkersQuerySchema,
  SupplyReportSchema,
} from "./dto.js";
export type {
  RecordMarkerDto,
  ExpectConfirmationDto,
  ListMarkersQuery,
  SupplyReportDto,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Auth
export { ROLE_PERMISSIONS, hasPermission } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord } from "./auth.js";

// App env
export type { AppEnv } from "./api-contract.js";
