export * from "./attemptMachine";
export * from "./backoff";
export * from "./channel";
export * from "./fetchWorker";
export * from "./hostGate";
export * from "./landingPageParser";
export * from "./workerPool";
