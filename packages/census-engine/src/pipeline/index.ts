export * from "./census-run";
