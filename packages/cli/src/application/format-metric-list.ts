import type { MetricCategory } from "@repometrics/core";
import { METRIC_CATEGORIES, metricsForCategory } from "@repometrics/metrics";

const CATEGORY_ORDER: readonly MetricCategory[] = ["commit_activity", "code_churn", "reliability", "flow"];

export const formatMetricList = (): string => {
  const lines: string[] = [];

  for (const category of CATEGORY_ORDER) {
    if (lines.length > 0) {
      lines.push("");
    }
    lines.push(`${category}: ${METRIC_CATEGORIES[category]}`);
    for (const metric of metricsForCategory(category)) {
      lines.push(`  ${metric.name.padEnd(22)}${metric.description}`);
    }
  }

  return lines.join("\n");
};
