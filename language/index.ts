// language/index.ts

import { TranslationStage } from "../types/stage";
import { CallStage } from "./calls";
import { ClassifyStage } from "./classify";
import { CommentsStage } from "./comments";
import { ControlFlowStage } from "./control_flow";
import { InferenceStage } from "./declarations";
import { IntrinsicsStage } from "./intrinsics";
import { LexicalStage } from "./lexical";
import { SubscriptStage } from "./subscripts";

/**
 * ALL_STAGES: the translation stages in the only order that is correct.
 * Subscripts and calls read kinds that inference fills in, and labels are
 * named after the unit the header opened.
 */
export const ALL_STAGES: readonly TranslationStage[] = [
  new LexicalStage(),
  new ClassifyStage(),
  new InferenceStage(),
  new SubscriptStage(),
  new ControlFlowStage(),
  new CallStage(),
  new IntrinsicsStage(),
  new CommentsStage(),
];

export const STAGE_NAMES: readonly string[] = ALL_STAGES.map((s) => s.name);

/**
 * getStages(until):
 *   The pipeline prefix ending with the stage named `until`, or every
 *   stage when it is omitted. An unknown name is a programming error.
 */
export function getStages(until?: string): TranslationStage[] {
  if (until === undefined) return [...ALL_STAGES];
  const index = STAGE_NAMES.indexOf(until);
  if (index === -1) {
    throw new Error(`Unknown stage "${until}"; expected one of ${STAGE_NAMES.join(", ")}`);
  }
  return ALL_STAGES.slice(0, index + 1);
}
