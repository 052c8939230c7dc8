export * from "./config";
export * from "./drive";
export * from "./errors";
export * from "./storage";
export * from "./sync";
