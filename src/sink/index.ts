import { AppConfig } from "../config";
import { LocalJsonlSink, NoopSink } from "./localJsonlSink";
import { Sink } from "./types";

export function createSink(config: AppConfig, runId: string, sinkType = process.env.SINK_TYPE ?? "local_jsonl"): Sink {
  switch (sinkType.toLowerCase()) {
    case "local_jsonl":
      return new LocalJsonlSink(config, runId);
    case "none":
      return new NoopSink();
    default:
      throw new Error(`Unsupported sink type: ${sinkType}`);
  }
}

export { LocalJsonlSink, NoopSink } from "./localJsonlSink";
export * from "./types";
