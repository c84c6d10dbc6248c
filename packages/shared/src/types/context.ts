/** Arbitrary structured data read from project.context.json */
export type ContextPayload = Record<string, unknown>;

/** Result of loading the optional project context */
export interface LoadedContext {
  payload: ContextPayload;
  /** Payload pretty-printed for prompt embedding ("{}" when absent) */
  contextJson: string;
  /** Human-readable summary; empty when the file could not be read */
  message: string;
}
