export * from "./csv";
export * from "./loader";
