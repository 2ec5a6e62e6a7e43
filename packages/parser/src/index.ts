export * from "./class-diagram";
