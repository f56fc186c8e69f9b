export * from "./schema";
export * from "./config";
export * from "./errors";
export * from "./logger";
export * from "./adapters";
export * from "./rate/clock";
export * from "./rate/rate-gate";
export * from "./taxonomy";
export * from "./listing";
export * from "./histogram";
export * from "./report";
export * from "./pipeline";
