export * from "./credential-store";
export * from "./drive-auth";
export * from "./drive-client";
export * from "./folder-sync";
export * from "./repo-archiver";
export * from "./local-archiver";
export * from "./object-storage";
export * from "./cleanup";
export * from "./pipeline";
