export * from "./combat";
export * from "./logger";
