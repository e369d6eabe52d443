/**
 * Example trial executor: scores a configuration from its numeric fields
 * and echoes the configuration, plus the score, as output.
 */

import type { JsonValue, TrialContext, TrialOutcome } from "../src/index.js";
import { isJsonObject } from "../src/index.js";

function score(params: JsonValue): number {
  if (!isJsonObject(params)) {
    return 0;
  }
  const learningRate = typeof params.learningRate === "number" ? params.learningRate : 0;
  const vocabulary = typeof params.vocabulary === "number" ? params.vocabulary : 0;
  return Math.log10(vocabulary + 1) - Math.abs(Math.log10(learningRate || 1) + 2);
}

export async function executeTrial(context: TrialContext): Promise<TrialOutcome> {
  const metric = score(context.params);
  const output: JsonValue = isJsonObject(context.params)
    ? { ...context.params, score: metric }
    : { value: context.params, score: metric };
  return { metric, output };
}
