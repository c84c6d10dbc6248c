import { ArtifactWriter } from "./services/artifact-writer.service.js";
import type { ModelClient } from "./services/model-client.js";
import { SynthesisService } from "./services/synthesis.service.js";

export interface PlannerServices {
  synthesis: SynthesisService;
  writer: ArtifactWriter;
}

/**
 * Build the per-run services that share the model client and the output directory.
 */
export function createPlannerServices(client: ModelClient, outputDir: string): PlannerServices {
  return {
    synthesis: new SynthesisService(client),
    writer: new ArtifactWriter(outputDir),
  };
}
