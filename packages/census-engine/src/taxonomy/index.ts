export * from "./kingdoms";
export * from "./phylum-cache";
export * from "./classifier";
