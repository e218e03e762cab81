/**
 * Central export point for the engine modules
 */

export * from "./types";
export * from "./forms";
export * from "./signs";
export * from "./arena";
export * from "./classifier";
export * from "./expression";
export * from "./forward";
export * from "./reducer";
export * from "./guards";
export * from "./sampler";
export * from "./synthesizer";
export * from "./reporter";
export * from "./describe";
export * from "./cache";
export * from "./config";
export * from "./errors";
export * from "./predicates";
export * from "./utils";
export * from "./logger";
