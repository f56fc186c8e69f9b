export * from "./types";
export * from "./inat";
export * from "./rate-limited";
