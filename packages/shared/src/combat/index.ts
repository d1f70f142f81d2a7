export * from "./abilities";
export * from "./combat-messages";
export * from "./errors";
export * from "./kinematics";
export * from "./object-size";
export * from "./outcomes";
export * from "./targeting";
