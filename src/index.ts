export * from "./core/config";
export * from "./core/release";
export * from "./core/download";
export * from "./core/spec-file";
export * from "./core/exec";
export * from "./core/srpm";
export * from "./core/copr";
export * from "./core/ci-output";
export * from "./core/update";
export * from "./types/errors";
