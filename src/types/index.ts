export * from "./logger";
export * from "./config";
export * from "./link";
export * from "./enrichment";
export * from "./transform";
export * from "./tabSource";
export * from "./output";
export * from "./clients/http";
