export * from "./board";
export * from "./climb";
export * from "./diagram";
export * from "./snapshot";
export * from "./viewport";
