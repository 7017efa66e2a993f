export * from "./options";
export * from "./run";
export * from "./drivers";
