export type * from "./foundational.js";
export type * from "./session.js";
export type * from "./error.js";
export type * from "./observability.js";
export type * from "./config.js";
