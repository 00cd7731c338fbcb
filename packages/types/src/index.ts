export type * from "./geometry";
export type * from "./tracer";
export type * from "./api";
