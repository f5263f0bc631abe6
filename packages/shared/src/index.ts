export * from "./schemas";
export * from "./records";
export * from "./savings";
export type * from "./types";
