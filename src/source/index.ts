export * from "./types";
export * from "./helpers";
export * from "./TextSource";
export * from "./BytesSource";
export * from "./ListSource";
