export * from "./types";
export * from "./csv";
export * from "./csv-file-sink";
export * from "./memory-sink";
