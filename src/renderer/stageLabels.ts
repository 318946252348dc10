import type { StageId } from "../types.js"

export const STAGE_LABELS: Record<StageId, string> = {
    parallel_analyze: "Analyze",
    sequential_refine: "Refine",
    parallel_reanalyze: "Re-analyze",
    aggregate: "Aggregate",
}

export function getStageLabel(stage: StageId): string {
    return STAGE_LABELS[stage]
}
