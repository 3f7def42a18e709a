export * from "./config/load_dotenv";
export * from "./config/runtime_env";
export * from "./errors";
export * from "./logging";
export * from "./metrics";
export * from "./types/policy";
export * from "./types/query";
export * from "./types/record";
export * from "./types/transport";
export * from "./utils/time";
