export { asyncHandler, boundPort, closeServer, createApp, errorHandler, listen, parseWith, statusFor } from "./http.js";
export { createPipelineApp, PIPELINE_SERVICE_NAME, QUEUE_UNAVAILABLE, type PipelineAppDeps } from "./pipelineApp.js";
export { createRagApp, RAG_SERVICE_NAME, type RagAppDeps } from "./ragApp.js";
export {
  INTERRUPTED_MESSAGE,
  PipelineServices,
  RagServices,
  SharedResources,
  createChatModel,
  createEmbedder,
  createRedis,
  startServices,
  type RunningServices,
  type ServiceOverrides,
} from "./services.js";
