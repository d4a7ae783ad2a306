import { AppConfig } from "../config";
import { Logger } from "../observability";
import { ColumnarStore } from "./columnarStore";

export function createColumnarStore(config: AppConfig, logger?: Logger): ColumnarStore {
  return new ColumnarStore(config.outputDirs.tables, logger);
}

export { ColumnarStore, csvField } from "./columnarStore";
export * from "./types";
