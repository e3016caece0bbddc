export * from "./logger.ts";
export * from "./request-id.ts";
export * from "./errors.ts";
export * from "./metrics.ts";
export * from "./rate-limit.ts";
export * from "./provider.ts";
export * from "./provider-registry.ts";
export * from "./create-app.ts";
