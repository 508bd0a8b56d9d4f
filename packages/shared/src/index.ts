export * from "./errors";
export * from "./messages";
export * from "./prng";
export * from "./seed";
