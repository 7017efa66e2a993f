export * from "./types";
export * from "./helpers";
export * from "./parsers";
export * from "./combinators";
export * from "./presets";
