export * from "./logger";
export * from "./env";
export * from "./clients/http";
export * from "./linkExtraction";
export * from "./enrichment";
export * from "./transform";
export * from "./output";
export * from "./htmlText";
