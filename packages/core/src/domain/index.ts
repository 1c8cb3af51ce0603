export * from "./job-spec";
export * from "./stage";
export * from "./run-report";
