/**
 * @deepsearch/web
 * Web discovery and extraction clients
 */

// Types
export {
  BraveWebResultSchema,
  type BraveWebResult,
  BraveSearchResponseSchema,
  type BraveSearchResponse,
  ExtractResponseSchema,
  type ExtractResponse,
  type DiscoveryRecord,
  type ExtractionResult,
  NOT_FOUND,
  goalKey,
  isNotFound,
  normalizeBraveResult,
  buildGoalSchema,
} from "./types.js";

// Clients
export {
  BraveSearchClient,
  createBraveSearchClient,
  type BraveSearchOptions,
  type FetchLike,
  type HttpResponseLike,
} from "./search-client.js";

export {
  FirecrawlExtractor,
  createFirecrawlExtractor,
  buildExtractionPrompt,
  type ExtractApi,
  type ExtractRequest,
  type FirecrawlExtractorOptions,
} from "./extract-client.js";

// Retry
export { withSingleRetry, sleep, type RetryOptions } from "./retry.js";
