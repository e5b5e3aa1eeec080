export * from "./config/load_dotenv";
export * from "./config/runtime_env";
export * from "./errors";
export * from "./job_state";
export * from "./logging";
export * from "./metrics";
export * from "./types/extraction";
export * from "./types/job";
export * from "./types/usage";
