export * from "./types";
export { DEFAULT_CONFIG, loadConfig, parseConfigOverrides } from "./loadConfig";
