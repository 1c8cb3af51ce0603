export * from "./cli";
export * from "./config";
export * from "./logger";
export * from "./output-placer";
export * from "./report";
export * from "./retry";
export * from "./run";
export * from "./signals";
export * from "./stage-executor";
export * from "./pipeline/completion-marker";
export * from "./pipeline/fingerprint";
export * from "./pipeline/job-pipeline";
export * from "./pipeline/pipeline-run";
export * from "./pipeline/plan";
export * from "./pipeline/working-dir";
export * from "./scheduler/index";
export * from "./stages/index";
