export * from "./orchestrator";
