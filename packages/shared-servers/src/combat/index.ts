export * from "./attack-roll";
export * from "./prng";
