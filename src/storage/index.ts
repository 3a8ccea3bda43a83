export * from "./archiveStore";
