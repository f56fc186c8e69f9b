export * from "./histogram";
export * from "./reconciler";
