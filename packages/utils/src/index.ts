export * from "./logger";
export * from "./math";
