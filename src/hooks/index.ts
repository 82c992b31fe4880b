export * from "./tool-hooks";
