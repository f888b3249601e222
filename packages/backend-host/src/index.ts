export * from "./host-buffer";
export * from "./host-provider";
export * from "./host-recorder";
