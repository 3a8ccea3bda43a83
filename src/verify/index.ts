export * from "./textStats";
export * from "./verifier";
