export * from "./memory-pool";
