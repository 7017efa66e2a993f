export * from "./source";
export * from "./result";
export * from "./utility";
export * from "./parser";
export * from "./driver";
export * from "./report";
export * from "./toolkit";
export * from "./grammars";
