export * from "./java";
