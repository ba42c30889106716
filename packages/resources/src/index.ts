export * from "./logging";
export * from "./parsers";
export * from "./postgres";
export * from "./resources";
export * from "./session";
export * from "./storage";
export * from "./types";
export * from "./utils";
