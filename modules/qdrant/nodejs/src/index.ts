import type { ControllerRegistry } from "@apphost/runtime";
import { qdrantServerController } from "./server-controller.js";

export {
  API_KEY_ENV,
  ENABLE_STATIC_CONTENT_ENV,
  PRIMARY_ENDPOINT_NAME,
  QDRANT_DATA_PATH,
  QDRANT_GRPC_PORT,
  QDRANT_REST_PORT,
  QdrantContainerImageTags,
  QdrantServerResource,
  REST_ENDPOINT_NAME,
  addQdrant,
  withDataBindMount,
  withDataVolume,
} from "./qdrant-server.js";
export type { QdrantOptions } from "./qdrant-server.js";
export { QdrantServerSchema, qdrantServerController } from "./server-controller.js";

export function registerQdrantControllers(registry: ControllerRegistry): ControllerRegistry {
  return registry.register(qdrantServerController);
}
