// src/planner/index.ts

export { Planner, estimateResources, simulateAction } from "./simulator";
export type { PlanResult, ResourceEstimate } from "./simulator";
export { generateDockerfile, exposedPorts, frameworkDependencies } from "./dockerfile";
export { CODE_GENERATORS, selectGenerator, buildRoutes, handlerName } from "./generators";
export type { CodeGenerator, GeneratorContext, GeneratorSelection, Route } from "./generators";
