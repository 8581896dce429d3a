/**
 * @errmap/context — Response contexts and their default rendering.
 *
 * Provides:
 * - ResponseContext and its immutable builder
 * - IntoResponseContext, the capability derived error types implement
 * - The `{ result: null, error: { code, message } }` envelope
 * - renderResponse, the default JSON renderer
 *
 * @packageDocumentation
 */

// Context
export {
  ResponseContext,
  ResponseContextBuilder,
  isIntoResponseContext,
  isValidStatusCode,
  MIN_STATUS_CODE,
  MAX_STATUS_CODE,
} from "./context.js";
export type { IntoResponseContext, ResponseContextFields } from "./context.js";

// Envelope
export {
  createErrorEnvelope,
  resolveContext,
  DEFAULT_STATUS_CODE,
  DEFAULT_ERROR_CODE,
  DEFAULT_ERROR_MESSAGE,
} from "./envelope.js";
export type { ErrorDetail, ErrorEnvelope, ResolvedContext } from "./envelope.js";

// Rendering
export { renderBody, renderResponse, JSON_CONTENT_TYPE } from "./render.js";
export type { ResponseRenderer } from "./render.js";
