export * from "./BatchService";
export * from "./BatchServiceDefault";
