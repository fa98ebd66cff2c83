export { DEFAULT_CONFIG, loadConfig, toList } from "./loadConfig";
export type { AppConfig, ConfigOverrides, OutputDirs, SinkType } from "./types";
