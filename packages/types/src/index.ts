export * from "./backing";
export * from "./command";
export * from "./diagnostics";
export * from "./heap";
