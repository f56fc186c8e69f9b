export * from "./filter-file";
export * from "./species-fetcher";
