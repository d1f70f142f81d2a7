// Shared types, schemas, and helpers for @skirmish/server

export * from "./schemas";
export * from "./constants";
export * from "./geometry";
export * from "./combat";
