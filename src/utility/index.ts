export * from "./count";
