export * from "./trustPolicy";
