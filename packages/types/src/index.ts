export type * from "./foundational.js";
export type * from "./observability.js";
export type * from "./event-bus.js";
export type * from "./models.js";
export type * from "./protocol.js";
export type * from "./session.js";
export type * from "./tool.js";
