import type { ControllerRegistry } from "../controller-registry.js";
import { containerController } from "./container/container-controller.js";
import { executableController } from "./executable/executable-controller.js";
import { connectionStringController, parameterController } from "./parameter/parameter-controller.js";
import { projectController } from "./project/project-controller.js";

export { ContainerSchema, containerController } from "./container/container-controller.js";
export { ExecutableSchema, executableController } from "./executable/executable-controller.js";
export {
  ConnectionStringSchema,
  ParameterSchema,
  connectionStringController,
  parameterController,
} from "./parameter/parameter-controller.js";
export { ProjectSchema, projectController } from "./project/project-controller.js";

export function registerBuiltinControllers(registry: ControllerRegistry): ControllerRegistry {
  return registry
    .register(containerController)
    .register(projectController)
    .register(executableController)
    .register(parameterController)
    .register(connectionStringController);
}
