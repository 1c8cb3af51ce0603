export * from "./destination-claims";
export * from "./lane-limiter";
export * from "./lane-policy";
export * from "./scheduler";
