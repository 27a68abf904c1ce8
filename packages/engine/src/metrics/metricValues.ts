import { METRIC_NAMES, type MetricName, type MetricValues } from '@hand-squeeze/shared';

/**
 * Transform every metric value, visiting metrics in canonical order.
 */
export function mapMetricValues(
  source: MetricValues,
  transform: (metric: MetricName, value: number) => number
): MetricValues {
  // Object literal properties evaluate top to bottom, which is the canonical order.
  return {
    tip_to_mcp_0: transform('tip_to_mcp_0', source.tip_to_mcp_0),
    tip_to_mcp_1: transform('tip_to_mcp_1', source.tip_to_mcp_1),
    tip_to_mcp_2: transform('tip_to_mcp_2', source.tip_to_mcp_2),
    tip_to_mcp_3: transform('tip_to_mcp_3', source.tip_to_mcp_3),
    thumb_to_index_mcp: transform('thumb_to_index_mcp', source.thumb_to_index_mcp),
    avg_tip_to_wrist: transform('avg_tip_to_wrist', source.avg_tip_to_wrist),
    mcp_to_mcp: transform('mcp_to_mcp', source.mcp_to_mcp),
  };
}

/**
 * Flatten metric values into the ordered vector sent to the receiver.
 */
export function toMetricVector(values: MetricValues): number[] {
  return METRIC_NAMES.map((metric) => values[metric]);
}
