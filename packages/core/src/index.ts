export * from "./domain/index";
export * from "./env-values";
export * from "./errors";
export * from "./failure-codes";
export * from "./failure-classifier";
export * from "./failure-retry-policy";
export * from "./retry-backoff";
export * from "./job-list";
export * from "./log-dir";
export * from "./path-segment";
