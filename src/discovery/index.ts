export * from "./catalog";
export * from "./discover";
export * from "./indexClient";
